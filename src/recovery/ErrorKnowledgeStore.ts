/**
 * Error Knowledge Store
 *
 * Signature-indexed memory of how past errors were resolved (or not).
 * Loaded once, rewritten in full after every recording call. Each mutation and
 * its write run under the store's mutex, so concurrent recordings never interleave.
 */

import { createLogger } from '../shared/logger.js'
import { getErrorMessage } from '../shared/assertError.js'
import { createMutex } from '../shared/mutex.js'
import { readJson, removeFile, writeJson } from '../store/readWriteJson.js'
import type {
  ErrorSignatureSource,
  LearnedPattern,
  LearnedSolution,
  LearningInsights,
} from '../types/knowledge.js'
import { generateErrorSignature, messageSimilarity } from './errorSignature.js'
import { knowledgeFileSchema } from './knowledgeSchema.js'
import {
  addFailedAttempt,
  addResolution,
  createPattern,
  patternWeight,
  topSolutions,
} from './learnedPattern.js'

const logger = createLogger('error-knowledge')

const DEFAULT_MAX_PATTERNS = 200
const MAX_LEARNED_SOLUTIONS = 5
const EXACT_MATCH_SOLUTIONS = 3
const SIMILAR_MATCH_SOLUTIONS = 2
/** Similar patterns must score strictly above this */
const SIMILARITY_THRESHOLD = 0.3
const TOP_PATTERNS = 10

export interface ErrorKnowledgeStoreOptions {
  /** Patterns kept when writing, heaviest first */
  maxPatterns?: number
  now?: () => Date
}

export class ErrorKnowledgeStore {
  private readonly patterns = new Map<string, LearnedPattern>()
  private readonly lock = createMutex()
  private readonly maxPatterns: number
  private readonly now: () => Date

  constructor(
    readonly filePath: string,
    options: ErrorKnowledgeStoreOptions = {}
  ) {
    this.maxPatterns = options.maxPatterns ?? DEFAULT_MAX_PATTERNS
    this.now = options.now ?? (() => new Date())
  }

  /** Create a store and load its file */
  static async open(
    filePath: string,
    options?: ErrorKnowledgeStoreOptions
  ): Promise<ErrorKnowledgeStore> {
    const store = new ErrorKnowledgeStore(filePath, options)
    await store.load()
    return store
  }

  /**
   * Replace in-memory patterns with the file's content.
   * A missing file means an empty store; an unreadable or invalid one is reported and ignored.
   */
  async load(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.patterns.clear()

      const raw = await readJson(this.filePath)
      if (!raw.ok) {
        logger.warn(`Could not read error knowledge ${this.filePath}: ${raw.error.message}`)
        return
      }
      if (raw.value === undefined) {
        logger.debug(`No error knowledge at ${this.filePath} yet`)
        return
      }

      const parsed = knowledgeFileSchema.safeParse(raw.value)
      if (!parsed.success) {
        logger.warn(
          `Ignoring invalid error knowledge ${this.filePath}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
        )
        return
      }

      for (const pattern of parsed.data.patterns) {
        this.patterns.set(pattern.signature, pattern)
      }
      logger.debug(`Loaded ${this.patterns.size} error patterns`)
    })
  }

  get size(): number {
    return this.patterns.size
  }

  async recordSuccessfulResolution(
    error: ErrorSignatureSource,
    solution: string,
    outcome: string
  ): Promise<void> {
    await this.lock.runExclusive(async () => {
      const pattern = this.findOrCreate(error)
      addResolution(pattern, { solution, outcome, timestamp: this.now().toISOString() })
      logger.debug(`Learned resolution for ${pattern.signature}: ${solution}`)
      await this.persist()
    })
  }

  async recordFailedResolution(
    error: ErrorSignatureSource,
    attemptedSolution: string,
    reason: string
  ): Promise<void> {
    await this.lock.runExclusive(async () => {
      const pattern = this.findOrCreate(error)
      addFailedAttempt(pattern, { attemptedSolution, reason })
      logger.debug(`Recorded failed attempt for ${pattern.signature}: ${attemptedSolution}`)
      await this.persist()
    })
  }

  /**
   * Up to five solutions for an error: the exact pattern's best three first,
   * then the best two of each sufficiently similar pattern of the same type,
   * most similar first. Duplicates collapse to their first occurrence and the
   * result is ordered by usage count.
   */
  getLearnedSolutions(error: ErrorSignatureSource): LearnedSolution[] {
    const signature = generateErrorSignature(error)
    const pool: LearnedSolution[] = []

    const exact = this.patterns.get(signature)
    if (exact) {
      pool.push(...topSolutions(exact, EXACT_MATCH_SOLUTIONS))
    }

    if (pool.length < MAX_LEARNED_SOLUTIONS) {
      const similar = [...this.patterns.values()]
        .filter(p => p.signature !== signature && p.errorType === error.type)
        .map(pattern => ({ pattern, similarity: messageSimilarity(error.message, pattern.sampleMessage) }))
        .filter(c => c.similarity > SIMILARITY_THRESHOLD)
        .sort((a, b) => b.similarity - a.similarity)

      for (const { pattern } of similar) {
        if (pool.length >= MAX_LEARNED_SOLUTIONS) break
        pool.push(...topSolutions(pattern, SIMILAR_MATCH_SOLUTIONS))
      }
    }

    const seen = new Set<string>()
    const unique = pool.filter(s => {
      if (seen.has(s.solution)) return false
      seen.add(s.solution)
      return true
    })

    return unique.sort((a, b) => b.usageCount - a.usageCount).slice(0, MAX_LEARNED_SOLUTIONS)
  }

  getPattern(signature: string): LearnedPattern | undefined {
    return this.patterns.get(signature)
  }

  listPatterns(): LearnedPattern[] {
    return [...this.patterns.values()]
  }

  getInsights(): LearningInsights {
    const patterns = this.listPatterns()
    const totalSuccesses = patterns.reduce((sum, p) => sum + p.successCount, 0)
    const totalFailures = patterns.reduce((sum, p) => sum + p.failureCount, 0)
    const attempts = totalSuccesses + totalFailures

    const patternsByType: Record<string, number> = {}
    for (const p of patterns) {
      patternsByType[p.errorType] = (patternsByType[p.errorType] ?? 0) + 1
    }

    return {
      totalPatterns: patterns.length,
      totalSuccesses,
      totalFailures,
      successRate: attempts === 0 ? 0 : totalSuccesses / attempts,
      patternsByType,
      topPatterns: [...patterns].sort((a, b) => b.successCount - a.successCount).slice(0, TOP_PATTERNS),
    }
  }

  /** Forget everything, on disk too */
  async clear(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.patterns.clear()
      try {
        await removeFile(this.filePath)
      } catch (e) {
        logger.warn(`Failed to delete error knowledge ${this.filePath}: ${getErrorMessage(e)}`)
      }
    })
  }

  private findOrCreate(error: ErrorSignatureSource): LearnedPattern {
    const signature = generateErrorSignature(error)
    let pattern = this.patterns.get(signature)
    if (!pattern) {
      pattern = createPattern(signature, error)
      this.patterns.set(signature, pattern)
    }
    return pattern
  }

  /** Must run under the lock. Write failures are logged, never thrown. */
  private async persist(): Promise<void> {
    const patterns = this.listPatterns()
      .sort((a, b) => patternWeight(b) - patternWeight(a))
      .slice(0, this.maxPatterns)

    try {
      await writeJson(this.filePath, { patterns })
    } catch (e) {
      logger.warn(`Failed to save error knowledge ${this.filePath}: ${getErrorMessage(e)}`)
    }
  }
}
