import { describe, it, expect } from 'vitest'
import { truncateText } from '../truncateText.js'

describe('truncateText', () => {
  it('keeps short single-line messages as they are', () => {
    expect(truncateText('Error: disk full', 60)).toBe('Error: disk full')
  })

  it('folds a multi-line message onto one line', () => {
    expect(truncateText('Build failed:\n  missing module\tfoo\n', 60)).toBe('Build failed: missing module foo')
  })

  it('measures the folded text, not the raw one', () => {
    expect(truncateText('a\n\n\n\nb', 3)).toBe('a b')
  })

  it('ends overlong messages with the suffix within maxLength', () => {
    expect(truncateText('Connection refused by upstream', 15)).toBe('Connection r...')
  })

  it('accepts a custom suffix', () => {
    expect(truncateText('Connection refused by upstream', 12, '…')).toBe('Connection …')
  })

  it('falls back to the bare suffix when maxLength is shorter than it', () => {
    expect(truncateText('timeout', 2)).toBe('...')
  })
})
