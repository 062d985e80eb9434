/**
 * Error Recovery Manager
 *
 * Turns thrown values into ErrorRecords, keeps a bounded newest-first history,
 * and assembles recovery suggestions: learned solutions first, then known message
 * patterns, then a recurring-issue hint, falling back to a generic suggestion by type.
 * Learning is forwarded to the knowledge store.
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage, getErrorName } from '../shared/assertError.js'
import type { ErrorRecord, LearnedSolution, LearningInsights } from '../types/knowledge.js'
import type { ErrorKnowledgeStore } from './ErrorKnowledgeStore.js'
import {
  genericSuggestion,
  matchKnownErrors,
  recurringIssueSuggestion,
  type RecoverySuggestion,
} from './recoverySuggestions.js'

const logger = createLogger('recovery')

const DEFAULT_MAX_HISTORY = 100
/** Similar errors already in history before the issue counts as recurring */
const RECURRING_THRESHOLD = 2
const SHARED_WORDS_FOR_SIMILARITY = 3

export interface RecoveryContext {
  error: ErrorRecord
  learnedSolutions: LearnedSolution[]
  suggestions: RecoverySuggestion[]
}

export interface ErrorStatistics {
  totalErrors: number
  byType: Record<string, number>
  byOperation: Record<string, number>
}

export interface ErrorRecoveryManagerOptions {
  maxHistory?: number
  now?: () => Date
}

export class ErrorRecoveryManager {
  private history: ErrorRecord[] = []
  private readonly maxHistory: number
  private readonly now: () => Date

  constructor(
    private readonly knowledge: ErrorKnowledgeStore,
    options: ErrorRecoveryManagerOptions = {}
  ) {
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY
    this.now = options.now ?? (() => new Date())
  }

  recordError(
    operation: string,
    fault: unknown,
    context: Record<string, unknown> = {}
  ): RecoveryContext {
    const message = getErrorMessage(fault)
    const record: ErrorRecord = {
      operation,
      type: getErrorName(fault),
      timestamp: this.now().toISOString(),
      context,
    }
    if (message) record.message = message

    this.history = [record, ...this.history].slice(0, this.maxHistory)
    logger.debug(`Recorded ${record.type} during "${operation}": ${message}`)

    const learnedSolutions = this.knowledge.getLearnedSolutions(record)
    return {
      error: record,
      learnedSolutions,
      suggestions: this.buildSuggestions(record, learnedSolutions),
    }
  }

  recordSuccessfulResolution(error: ErrorRecord, solution: string, outcome: string): Promise<void> {
    return this.knowledge.recordSuccessfulResolution(error, solution, outcome)
  }

  recordFailedResolution(error: ErrorRecord, attemptedSolution: string, reason: string): Promise<void> {
    return this.knowledge.recordFailedResolution(error, attemptedSolution, reason)
  }

  getRecentErrors(limit: number = 10): ErrorRecord[] {
    return this.history.slice(0, limit)
  }

  getStatistics(): ErrorStatistics {
    const byType: Record<string, number> = {}
    const byOperation: Record<string, number> = {}
    for (const error of this.history) {
      byType[error.type] = (byType[error.type] ?? 0) + 1
      byOperation[error.operation] = (byOperation[error.operation] ?? 0) + 1
    }
    return { totalErrors: this.history.length, byType, byOperation }
  }

  clearHistory(): void {
    this.history = []
  }

  getLearningInsights(): LearningInsights {
    return this.knowledge.getInsights()
  }

  clearLearning(): Promise<void> {
    return this.knowledge.clear()
  }

  private buildSuggestions(
    record: ErrorRecord,
    learnedSolutions: LearnedSolution[]
  ): RecoverySuggestion[] {
    const suggestions: RecoverySuggestion[] = []

    if (learnedSolutions.length > 0) {
      suggestions.push({
        title: 'Learned Solutions',
        description: 'Based on previous successful resolutions:',
        actions: learnedSolutions.map(
          s =>
            `${s.solution} (confidence: ${Math.round(s.confidence * 100)}%, used ${s.usageCount} times)`
        ),
        recommendedAction: 'retry',
      })
    }

    suggestions.push(...matchKnownErrors(record.message))

    const similar = this.history.filter(h => h !== record && isSimilarError(record, h)).length
    if (similar >= RECURRING_THRESHOLD) {
      suggestions.push(recurringIssueSuggestion(similar))
    }

    if (suggestions.length === 0) {
      suggestions.push(genericSuggestion(record.type))
    }
    return suggestions
  }
}

/** Same type, and either the same operation or at least three shared words */
function isSimilarError(a: ErrorRecord, b: ErrorRecord): boolean {
  if (a.type !== b.type) return false
  if (a.operation === b.operation) return true
  if (!a.message || !b.message) return false

  const wordsB = new Set(b.message.toLowerCase().split(/\s+/))
  const shared = new Set(a.message.toLowerCase().split(/\s+/).filter(w => wordsB.has(w)))
  return shared.size >= SHARED_WORDS_FOR_SIMILARITY
}
