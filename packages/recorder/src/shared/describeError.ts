/**
 * unknown な例外からメッセージを取り出す
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
