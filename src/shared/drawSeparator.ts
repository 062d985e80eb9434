/** 分隔线，带标题时形如 `── TITLE ─────` */
export function drawSeparator(title: string = '', width: number = 60): string {
  if (!title) return '─'.repeat(width)
  const head = `── ${title} `
  return head + '─'.repeat(Math.max(0, width - head.length))
}
