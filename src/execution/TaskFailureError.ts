/** 推理引擎的回复被判定为失败 */
export class TaskFailureError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TaskFailure'
  }
}
