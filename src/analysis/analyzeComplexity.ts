/**
 * 请求复杂度分析
 *
 * 纯函数：同一输入永远得到同一判定。关键词按整词（Unicode 边界）匹配，
 * 每个关键词只计一次。
 */

import {
  ACTION_VERBS,
  COMPLEX_ACTION_KEYWORDS,
  COMPLEXITY_INDICATORS,
  COMPONENT_KEYWORDS,
  FILE_EXTENSIONS,
  SIMPLE_QUERY_KEYWORDS,
  STEP_CONJUNCTIONS,
  TOOL_SIGIL,
} from './complexityKeywords.js'

export type ComplexityLevel = 'simple' | 'moderate' | 'complex' | 'very_complex'

export interface ComplexityVerdict {
  readonly level: ComplexityLevel
  readonly score: number
  readonly reasoning: string
}

const LEVEL_THRESHOLDS: ReadonlyArray<[number, ComplexityLevel]> = [
  [10, 'very_complex'],
  [6, 'complex'],
  [3, 'moderate'],
]

const LONG_INPUT_WORDS = 15

const WORD_CHAR = '[\\p{L}\\p{N}_]'

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

function wordPattern(keyword: string): RegExp {
  return new RegExp(`(?<!${WORD_CHAR})${escapeRegExp(keyword)}(?!${WORD_CHAR})`, 'u')
}

function compile(keywords: readonly string[]): RegExp[] {
  return [...new Set(keywords)].map(wordPattern)
}

const ACTION_PATTERNS = compile(COMPLEX_ACTION_KEYWORDS)
const INDICATOR_PATTERNS = compile(COMPLEXITY_INDICATORS)
const VERB_PATTERNS = compile(ACTION_VERBS)
const COMPONENT_PATTERNS = compile(COMPONENT_KEYWORDS)
const QUERY_PREFIX_PATTERNS = [...new Set(SIMPLE_QUERY_KEYWORDS)].map(
  kw => new RegExp(`^${escapeRegExp(kw)}(?!${WORD_CHAR})`, 'u')
)
const FILE_MENTION_PATTERN = new RegExp(
  `[\\w./-]+\\.(?:${FILE_EXTENSIONS.join('|')})(?!${WORD_CHAR})`,
  'gu'
)

function countMatches(text: string, patterns: RegExp[]): number {
  return patterns.filter(p => p.test(text)).length
}

function countFileMentions(text: string): number {
  return new Set(text.match(FILE_MENTION_PATTERN) ?? []).size
}

function isSimpleQuestion(text: string): boolean {
  if (!text.includes('?')) return false
  return (
    QUERY_PREFIX_PATTERNS.some(p => p.test(text)) ||
    SIMPLE_QUERY_KEYWORDS.some(kw => text.includes(` ${kw} `))
  )
}

function levelFor(score: number): ComplexityLevel {
  for (const [threshold, level] of LEVEL_THRESHOLDS) {
    if (score >= threshold) return level
  }
  return 'simple'
}

function simple(reasoning: string): ComplexityVerdict {
  return { level: 'simple', score: 0, reasoning }
}

/**
 * 判断一条自然语言请求的复杂度
 *
 * @example
 * analyzeComplexity('refactor the database module')
 * // { level: 'complex', score: 8, reasoning: 'Action keywords: 1; Complexity indicators: 2' }
 */
export function analyzeComplexity(input: string): ComplexityVerdict {
  const text = input.trim().toLowerCase()

  if (!text) return simple('Empty input')
  if (text.startsWith(TOOL_SIGIL)) return simple('Tool command')
  if (isSimpleQuestion(text)) return simple('Simple question')

  let score = 0
  const reasons: string[] = []

  const actions = countMatches(text, ACTION_PATTERNS)
  if (actions > 0) {
    score += actions * 2
    reasons.push(`Action keywords: ${actions}`)
  }

  const indicators = countMatches(text, INDICATOR_PATTERNS)
  if (indicators > 0) {
    score += indicators * 3
    reasons.push(`Complexity indicators: ${indicators}`)
  }

  const verbs = countMatches(text, VERB_PATTERNS)
  if (verbs > 1) {
    score += (verbs - 1) * 2
    reasons.push(`Multiple actions: ${verbs}`)
  }

  const mentions = countFileMentions(text) + countMatches(text, COMPONENT_PATTERNS)
  if (mentions > 1) {
    score += mentions * 2
    reasons.push(`Multiple files/components: ${mentions}`)
  }

  if (STEP_CONJUNCTIONS.some(c => text.includes(c))) {
    score += 3
    reasons.push('Multiple steps')
  }

  const words = text.split(/\s+/).length
  if (words > LONG_INPUT_WORDS) {
    score += 2
    reasons.push(`Long input (${words} words)`)
  }

  return {
    level: levelFor(score),
    score,
    reasoning: reasons.length > 0 ? reasons.join('; ') : 'Basic task',
  }
}

/** complex 及以上才建议先出计划 */
export function shouldSuggestPlan(verdict: ComplexityVerdict): boolean {
  return verdict.level === 'complex' || verdict.level === 'very_complex'
}
