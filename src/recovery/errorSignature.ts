/**
 * Error signature and message similarity.
 */

import type { ErrorSignatureSource } from '../types/knowledge.js'

const SIGNATURE_WORDS = 5
const MIN_WORD_LENGTH = 4

/**
 * Stable key for a class of errors: the error type followed by up to five distinct
 * lowercase words (length ≥ 4) of the message, in first-seen order.
 *
 * @example
 * generateErrorSignature({ type: 'TaskFailure', message: 'Error: disk full on /dev/sda1' })
 * // 'TaskFailure_error_disk_full_sda1'
 */
export function generateErrorSignature(error: ErrorSignatureSource): string {
  const words: string[] = []
  const tokens = (error.message ?? '')
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)

  for (const token of tokens) {
    if (words.length === SIGNATURE_WORDS) break
    if (token.length >= MIN_WORD_LENGTH && !words.includes(token)) {
      words.push(token)
    }
  }

  return [error.type, ...words].join('_')
}

function wordSet(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/\s+/)
      .filter(w => w.length > 0)
  )
}

/** Jaccard index of the two messages' word sets; 0 when either is missing */
export function messageSimilarity(a: string | undefined, b: string | undefined): number {
  if (!a || !b) return 0
  const wordsA = wordSet(a)
  const wordsB = wordSet(b)

  let intersection = 0
  for (const w of wordsA) {
    if (wordsB.has(w)) intersection++
  }
  const union = wordsA.size + wordsB.size - intersection
  return union === 0 ? 0 : intersection / union
}
