/**
 * 单行化并截断：空白（含换行）折叠为一个空格，超长时以 suffix 结尾
 * 用于在洞察列表中展示多行错误消息的样本
 */
export function truncateText(text: string, maxLength: number = 40, suffix: string = '...'): string {
  const line = text.replace(/\s+/g, ' ').trim()
  if (line.length <= maxLength) return line
  return line.slice(0, Math.max(0, maxLength - suffix.length)) + suffix
}
