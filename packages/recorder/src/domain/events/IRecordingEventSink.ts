import type { CameraId } from '@dashcam/common-types';

/**
 * IRecordingEventSink - 録画コントローラーが発行するライフサイクルイベント
 *
 * 所有セッション層が実装する。配信はコントロール用キューとは別のコンテキストで、
 * 同一セッション内では発生順（FIFO）
 */
export interface IRecordingEventSink {
  /**
   * 最初のセグメントの開始時のみ（セッションにつき1回）
   */
  onRecordStart(cameraId: CameraId): void;

  /**
   * セグメント切替完了。新しいサーフェスの再バインドと start() を待っている
   */
  onSegmentSwitch(cameraId: CameraId, newSegmentIndex: number): void;

  onRecordStop(cameraId: CameraId): void;

  onRecordError(cameraId: CameraId, message: string): void;
}
