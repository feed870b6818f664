import type { RecordingSessionSnapshot } from './recording.js';

/**
 * カメラ識別子（設定ファイル上のID。例: "cam0"）
 */
export type CameraId = string;

/**
 * カメラの取り付け位置タグ（front / back / left / right など）
 * ファイル名の末尾に埋め込まれる（例: 20240101_120000_front.mp4）
 */
export type CameraPosition = string;

/**
 * ファイル名から位置を判別できなかった場合のタグ
 */
export const UNKNOWN_CAMERA_POSITION = 'unknown';

/**
 * 物理カメラの定義
 */
export interface CameraDescriptor {
  cameraId: CameraId;
  position: CameraPosition;
  /** V4L2 デバイスパス（例: /dev/video0） */
  device: string;
}

/**
 * GET /api/cameras のレスポンス要素
 */
export interface CameraStatus extends CameraDescriptor {
  captureRunning: boolean;
  deliveredFrames: number;
  droppedFrames: number;
  session: RecordingSessionSnapshot;
}
