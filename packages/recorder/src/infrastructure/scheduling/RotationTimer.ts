import type { SerialTaskQueue } from './SerialTaskQueue.js';

/**
 * RotationTimer - セグメント境界を作る単発・キャンセル可能なタイマー
 *
 * 発火は直接コールバックを呼ばず、コントローラーと同じ SerialTaskQueue に積む。
 * キュー上で世代番号を再確認するため、cancel() 後や再スケジュール後の
 * 古い発火がコールバックに到達することはない
 */
export class RotationTimer {
  private handle: NodeJS.Timeout | null = null;
  private generation = 0;

  constructor(private readonly queue: SerialTaskQueue) {}

  /**
   * delayMs 後に callback をキュー上で実行する。既存のスケジュールは破棄
   */
  schedule(delayMs: number, callback: () => void | Promise<void>): void {
    this.cancel();
    const scheduled = this.generation;

    this.handle = setTimeout(() => {
      this.handle = null;
      this.queue
        .enqueue(async () => {
          if (scheduled !== this.generation) {
            return;
          }
          this.generation += 1;
          await callback();
        })
        .catch((error: unknown) => {
          console.error('❌ [RotationTimer] Scheduled task failed:', error);
        });
    }, delayMs);
  }

  cancel(): void {
    this.generation += 1;
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }

  /**
   * 発火待ち（キュー投入前）のスケジュールがあるか
   */
  isPending(): boolean {
    return this.handle !== null;
  }
}
