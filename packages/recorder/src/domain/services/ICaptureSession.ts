import type { InputSurface } from './IEncoderBackend.js';

/**
 * ICaptureSession - カメラのピクセル出力先を所有するキャプチャセッション
 *
 * エンコーダーが差し替わると入力サーフェスも変わるため、
 * 新しいサーフェスをバインドし直せるのはこのセッションだけ
 */
export interface ICaptureSession {
  start(): Promise<void>;

  stop(): Promise<void>;

  isRunning(): boolean;

  /**
   * フレームの書き込み先を差し替える。null でバインド解除
   */
  rebindSurface(surface: InputSurface | null): void;

  getBoundSurface(): InputSurface | null;

  /** エンコーダーに書き込んだフレーム数 */
  getDeliveredFrameCount(): number;

  /**
   * 書き込み先がなく捨てたフレーム数
   */
  getDroppedFrameCount(): number;
}
