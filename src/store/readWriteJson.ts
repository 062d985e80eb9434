/**
 * JSON 文件读写工具
 *
 * 写入总是原子化（先写临时文件再 rename），中断不会留下半个文件。
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises'
import { dirname } from 'path'
import { err, ok, type Result } from '../shared/result.js'
import { ensureError } from '../shared/assertError.js'

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

/**
 * 读取并解析 JSON 文件
 *
 * 文件不存在返回 ok(undefined)；读取或解析失败返回 err，由调用方决定是否降级
 */
export async function readJson(filepath: string): Promise<Result<unknown, Error>> {
  let content: string
  try {
    content = await readFile(filepath, 'utf-8')
  } catch (e) {
    if (isMissingFile(e)) return ok(undefined)
    return err(ensureError(e))
  }

  try {
    const parsed: unknown = JSON.parse(content)
    return ok(parsed)
  } catch (e) {
    return err(ensureError(e))
  }
}

/** 两空格缩进写入，缺失的目录会被创建 */
export async function writeJson(filepath: string, data: unknown): Promise<void> {
  const tempPath = `${filepath}.${process.pid}.tmp`

  await mkdir(dirname(filepath), { recursive: true })
  await writeFile(tempPath, JSON.stringify(data, null, 2), 'utf-8')
  await rename(tempPath, filepath)
}

/** 删除文件，不存在时不报错 */
export async function removeFile(filepath: string): Promise<void> {
  await rm(filepath, { force: true })
}
