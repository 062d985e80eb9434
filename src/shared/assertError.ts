/**
 * Error type guards and message extraction utilities.
 */

export function isError(value: unknown): value is Error {
  return value instanceof Error
}

/** Message of an unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}

/**
 * Name used to classify a thrown value.
 * Plain strings count as `Error`; anything else that is not an Error is `UnknownError`.
 */
export function getErrorName(error: unknown): string {
  if (error instanceof Error) return error.name
  if (typeof error === 'string') return 'Error'
  return 'UnknownError'
}

export function ensureError(value: unknown): Error {
  if (value instanceof Error) return value
  return new Error(String(value))
}
