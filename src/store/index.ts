/**
 * @entry Store 文件存储
 *
 * JSON 读写（原子写入）与数据目录路径
 */

export { readJson, writeJson, removeFile } from './readWriteJson.js'
export { DATA_DIR, FILE_NAMES, ERROR_KNOWLEDGE_FILE } from './paths.js'
