/**
 * 复杂度判定使用的关键词（英文 + 法文）
 * 全部小写，匹配时按整词、去重计数
 */

/** 动作关键词，每个 +2 */
export const COMPLEX_ACTION_KEYWORDS = [
  'add',
  'create',
  'implement',
  'build',
  'develop',
  'setup',
  'configure',
  'integrate',
  'migrate',
  'refactor',
  'redesign',
  'restructure',
  'ajoute',
  'crée',
  'implémente',
  'développe',
  'intègre',
] as const

/** 领域关键词，每个 +3 */
export const COMPLEXITY_INDICATORS = [
  'system',
  'feature',
  'functionality',
  'module',
  'component',
  'service',
  'authentication',
  'authorization',
  'api',
  'database',
  'architecture',
  'système',
  'fonctionnalité',
  'composant',
  'authentification',
  'base de données',
] as const

/** 出现在问句里时判定为简单问题 */
export const SIMPLE_QUERY_KEYWORDS = [
  'what',
  'how',
  'where',
  'when',
  'why',
  'explain',
  'show',
  'display',
  'comment',
  'où',
  'quand',
  'pourquoi',
  'explique',
  'montre',
  'affiche',
] as const

/** 动词，出现 2 个及以上时按 (n - 1) × 2 加分 */
export const ACTION_VERBS = [
  'add',
  'create',
  'implement',
  'build',
  'make',
  'write',
  'modify',
  'update',
  'delete',
  'remove',
  'change',
  'configure',
  'setup',
  'install',
  'integrate',
  'ajoute',
  'crée',
  'implémente',
  'construis',
  'fais',
  'écris',
  'modifie',
  'supprime',
  'installe',
  'intègre',
] as const

/** 代码组件名，与文件提及一起计数 */
export const COMPONENT_KEYWORDS = [
  'controller',
  'service',
  'repository',
  'model',
  'entity',
  'dto',
  'config',
  'configuration',
  'filter',
  'interceptor',
  'handler',
] as const

/** 识别为源码/配置文件的扩展名 */
export const FILE_EXTENSIONS = [
  'java',
  'py',
  'js',
  'ts',
  'tsx',
  'jsx',
  'xml',
  'json',
  'yaml',
  'yml',
] as const

/** 工具命令前缀 */
export const TOOL_SIGIL = '@'

/** 多步骤连接词，前后带空格匹配 */
export const STEP_CONJUNCTIONS = [' and ', ' et '] as const
