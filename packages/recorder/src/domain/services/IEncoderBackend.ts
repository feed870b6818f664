import type { Writable } from 'stream';

/**
 * エンコーダーの入力サーフェス
 * キャプチャ側はここに生フレームを書き込む。インスタンスの同一性で再バインド要否を判定する
 */
export type InputSurface = Writable;

/**
 * バックエンド呼び出しの結果（例外ではなく値で返す）
 */
export type BackendResult = { ok: true } | { ok: false; error: string };

export const BACKEND_OK: BackendResult = { ok: true };

export function backendFailure(error: string): BackendResult {
  return { ok: false, error };
}

/**
 * IEncoderBackend - ハードウェア/ソフトウェアエンコーダーの抽象
 *
 * 1インスタンス = 1セグメント。prepare → start → stop → release の順に1回ずつ使われる
 */
export interface IEncoderBackend {
  /**
   * 出力先と解像度を設定し、入力サーフェスを確保する（書き込みはまだ開始しない）
   */
  prepare(outputPath: string, width: number, height: number): Promise<BackendResult>;

  start(): Promise<BackendResult>;

  /**
   * ベストエフォート。失敗しても呼び出し側は「停止済み」として扱う
   */
  stop(): Promise<BackendResult>;

  /**
   * 冪等。失敗を外部に観測させない
   */
  release(): Promise<void>;

  inputSurfaceHandle(): InputSurface | null;
}

/**
 * セグメントごとに新しいエンコーダーを生成するファクトリ
 */
export type EncoderBackendFactory = () => IEncoderBackend;
