/**
 * リモートコマンド種別（チャット経由のトリガー）
 */
export type RemoteCommandType = 'record' | 'stop' | 'status' | 'help' | 'unknown';

/**
 * POST /api/commands のリクエスト
 */
export interface RemoteCommandRequest {
  text: string;
}

/**
 * POST /api/commands のレスポンス
 */
export interface RemoteCommandResponse {
  command: RemoteCommandType;
  reply: string;
}

/**
 * POST /api/recordings のリクエスト
 */
export interface StartRecordingRequest {
  /** 指定時はこの時間経過後に自動停止 */
  durationMs?: number;
}

/**
 * 録画を開始したカメラ
 */
export interface StartedCamera {
  cameraId: string;
  filePath: string;
}
