/**
 * ExecutionContext - タスクを投入する先のコンテキスト
 *
 * 録画イベントはコントロール用キューとは別のコンテキストで配信する
 */
export interface ExecutionContext {
  post(task: () => void): void;
}

/**
 * setImmediate で配信するコンテキスト（Node は投入順に実行する）
 * コールバックの例外はログに残し、他のタスクには波及させない
 */
export const immediateContext: ExecutionContext = {
  post(task: () => void): void {
    setImmediate(() => {
      try {
        task();
      } catch (error) {
        console.error('❌ [ExecutionContext] Event callback failed:', error);
      }
    });
  },
};

/**
 * 呼び出し元でそのまま実行するコンテキスト
 */
export const inlineContext: ExecutionContext = {
  post(task: () => void): void {
    try {
      task();
    } catch (error) {
      console.error('❌ [ExecutionContext] Event callback failed:', error);
    }
  },
};
