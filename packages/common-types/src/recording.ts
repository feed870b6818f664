import type { CameraId, CameraPosition } from './camera.js';

/**
 * 1セグメントの長さ（ミリ秒）
 */
export const SEGMENT_DURATION_MS = 60_000;

/**
 * セグメント録画セッションの状態
 * - idle: エンコーダー未保持
 * - prepared: エンコーダー準備済み（未開始）
 * - recording: 書き込み中
 * - awaiting_reconfiguration: セグメント切替後、入力サーフェスの再バインド待ち
 */
export type SegmentedRecordingState =
  | 'idle'
  | 'prepared'
  | 'recording'
  | 'awaiting_reconfiguration';

/**
 * 最初の prepare で確定する出力先パラメータ
 */
export interface SegmentTarget {
  saveDirectory: string;
  cameraPosition: CameraPosition;
  width: number;
  height: number;
}

/**
 * 録画セッションのスナップショット（API / WebSocket 通知用）
 */
export interface RecordingSessionSnapshot {
  cameraId: CameraId;
  state: SegmentedRecordingState;
  isRecording: boolean;
  awaitingReconfiguration: boolean;
  segmentIndex: number;
  currentFilePath: string | null;
  target: SegmentTarget | null;
}

/**
 * 録画済みセグメントファイルの情報
 */
export interface SegmentFile {
  fileName: string;
  path: string;
  cameraPosition: CameraPosition;
  /** ファイル名のタイムスタンプ（ISO 8601） */
  startedAt: string;
  size: number;
}
