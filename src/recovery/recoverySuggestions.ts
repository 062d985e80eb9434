/**
 * 恢复建议规则
 *
 * - KNOWN_ERROR_PATTERNS: 按错误消息匹配
 * - genericSuggestion: 没有任何匹配时按错误类型兜底
 */

export type RecoveryAction =
  | 'retry'
  | 'provide_different_input'
  | 'fix_code'
  | 'manual_intervention'
  | 'skip'

export interface RecoverySuggestion {
  title: string
  description: string
  actions: string[]
  recommendedAction: RecoveryAction
}

interface KnownErrorPattern {
  pattern: RegExp
  suggestion: RecoverySuggestion
}

export const KNOWN_ERROR_PATTERNS: readonly KnownErrorPattern[] = [
  {
    pattern: /no such file|file not found|cannot find|ENOENT/i,
    suggestion: {
      title: 'File Not Found',
      description: 'The specified file does not exist.',
      actions: [
        'Verify the file path is correct',
        'Check if the file was moved or deleted',
        'Create the file if it should exist',
      ],
      recommendedAction: 'provide_different_input',
    },
  },
  {
    pattern: /permission denied|access denied|EACCES|EPERM/i,
    suggestion: {
      title: 'Permission Denied',
      description: 'Insufficient permissions to perform the operation.',
      actions: [
        'Check file and directory permissions',
        'Run with appropriate user privileges',
        'Verify the file is not read-only',
      ],
      recommendedAction: 'manual_intervention',
    },
  },
  {
    pattern: /compilation error|cannot compile|syntax error|type error/i,
    suggestion: {
      title: 'Compilation Error',
      description: 'Code failed to compile.',
      actions: [
        'Review syntax errors in the code',
        'Check for missing imports or dependencies',
        'Verify variable and function names',
      ],
      recommendedAction: 'fix_code',
    },
  },
  {
    pattern: /connection refused|timed? ?out|unable to connect|ECONNREFUSED/i,
    suggestion: {
      title: 'Connection Error',
      description: 'Failed to establish connection.',
      actions: [
        'Check if the service is running',
        'Verify network connectivity',
        'Verify the endpoint URL is correct',
      ],
      recommendedAction: 'retry',
    },
  },
  {
    pattern: /\bgit\b|merge conflict|not a git repository/i,
    suggestion: {
      title: 'Git Operation Error',
      description: 'Git operation failed.',
      actions: [
        'Check that you are inside a git repository',
        'Inspect the repository state with git status',
        'Resolve any merge conflicts',
      ],
      recommendedAction: 'manual_intervention',
    },
  },
  {
    pattern: /out of memory|heap (?:space|out)|ENOMEM/i,
    suggestion: {
      title: 'Memory Error',
      description: 'Operation exceeded available memory.',
      actions: [
        'Process smaller batches of data',
        'Raise the Node.js heap limit (NODE_OPTIONS=--max-old-space-size)',
        'Check for memory leaks',
      ],
      recommendedAction: 'manual_intervention',
    },
  },
]

export function matchKnownErrors(message: string | undefined): RecoverySuggestion[] {
  if (!message) return []
  return KNOWN_ERROR_PATTERNS.filter(p => p.pattern.test(message)).map(p => p.suggestion)
}

export function recurringIssueSuggestion(occurrences: number): RecoverySuggestion {
  return {
    title: 'Recurring Issue Detected',
    description: `This error has occurred ${occurrences} times. Consider addressing the root cause.`,
    actions: [
      'Review the operation logs for patterns',
      'Check if the issue is configuration-related',
      'Consider refactoring the problematic code',
    ],
    recommendedAction: 'manual_intervention',
  }
}

export function genericSuggestion(errorType: string): RecoverySuggestion {
  switch (errorType) {
    case 'TaskFailure':
      return {
        title: 'Task Reported Failure',
        description: 'The engine could not complete the task.',
        actions: [
          'Rephrase the task with more concrete instructions',
          'Split the task into smaller steps',
          'Retry the task',
        ],
        recommendedAction: 'retry',
      }
    case 'EngineError':
      return {
        title: 'Reasoning Engine Error',
        description: 'The reasoning engine request failed.',
        actions: [
          'Check that the engine endpoint is running',
          'Verify the configured model exists',
          'Retry the task',
        ],
        recommendedAction: 'retry',
      }
    case 'TypeError':
      return {
        title: 'Null Reference Error',
        description: 'Attempted to use a missing value.',
        actions: [
          'Check if required parameters were provided',
          'Verify initialization order',
          'Add checks before accessing optional values',
        ],
        recommendedAction: 'manual_intervention',
      }
    default:
      return {
        title: 'Unexpected Error',
        description: `An unexpected error occurred: ${errorType}`,
        actions: ['Review error logs for details', 'Try the operation again', 'Report if the issue persists'],
        recommendedAction: 'retry',
      }
  }
}
