import type { CameraId } from './camera.js';

/**
 * 録画開始通知（セッションにつき1回）
 */
export interface RecordStarted {
  cameraId: CameraId;
  timestamp: number;
}

/**
 * セグメント切替通知
 */
export interface SegmentSwitched {
  cameraId: CameraId;
  segmentIndex: number;
  timestamp: number;
}

/**
 * 録画停止通知
 */
export interface RecordStopped {
  cameraId: CameraId;
  timestamp: number;
}

/**
 * 録画エラー通知
 */
export interface RecordFailed {
  cameraId: CameraId;
  message: string;
  timestamp: number;
}

/**
 * サーバーからクライアントへのイベント
 */
export interface RecorderServerToClientEvents {
  record_started: (data: RecordStarted) => void;
  segment_switched: (data: SegmentSwitched) => void;
  record_stopped: (data: RecordStopped) => void;
  record_error: (data: RecordFailed) => void;
}
