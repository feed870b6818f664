/**
 * SerialTaskQueue - 1セッション分の操作を直列化する実行コンテキスト
 *
 * prepare / start / stop / release とタイマー発火を同じキューに積むことで、
 * 前のタスクが完了（成功・失敗問わず）するまで次のタスクは始まらない
 */
export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * タスクを末尾に積み、その結果を返す
   * タスクの失敗は呼び出し側にだけ伝わり、後続タスクは止まらない
   */
  enqueue<T>(task: () => T | Promise<T>): Promise<T> {
    this.pending += 1;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /**
   * 実行中・待機中のタスク数
   */
  size(): number {
    return this.pending;
  }

  /**
   * 積まれているタスクがすべて完了するまで待つ
   * 待っている間に追加されたタスクも含む
   */
  async onIdle(): Promise<void> {
    while (this.pending > 0) {
      await this.tail;
    }
  }

  private settle(): void {
    this.pending -= 1;
  }
}
