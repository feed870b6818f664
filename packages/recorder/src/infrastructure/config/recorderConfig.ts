import { ConfigurationError, SEGMENT_DURATION_MS } from '@dashcam/common-types';
import type { CameraDescriptor } from '@dashcam/common-types';

export interface VideoConfig {
  width: number;
  height: number;
  frameRate: number;
  /** bits/s */
  bitrate: number;
  codec: string;
}

export interface RecorderConfig {
  recordingsDir: string;
  segmentDurationMs: number;
  video: VideoConfig;
  ffmpegPath: string;
  cameras: CameraDescriptor[];
  /** チャットの record コマンドで録画する長さ */
  timedRecordingMs: number;
  /** ffmpeg の stderr をログに出す */
  debug: boolean;
}

type Env = Record<string, string | undefined>;

const DEFAULT_CAMERAS = 'cam0:front:/dev/video0';

/**
 * 環境変数から録画設定を取得
 *
 * CAMERAS はカンマ区切りの id:position:device（例: cam0:front:/dev/video0,cam1:back:/dev/video2）
 */
export function getRecorderConfig(env: Env = process.env): RecorderConfig {
  return {
    recordingsDir: env.RECORDINGS_DIR || './recordings',
    segmentDurationMs: readPositiveInt(env, 'SEGMENT_DURATION_MS', SEGMENT_DURATION_MS),
    video: {
      width: readPositiveInt(env, 'VIDEO_WIDTH', 1280),
      height: readPositiveInt(env, 'VIDEO_HEIGHT', 720),
      frameRate: readPositiveInt(env, 'VIDEO_FRAME_RATE', 30),
      bitrate: readPositiveInt(env, 'VIDEO_BITRATE', 1_000_000),
      codec: env.VIDEO_CODEC || 'libx264',
    },
    ffmpegPath: env.FFMPEG_PATH || 'ffmpeg',
    cameras: parseCameras(env.CAMERAS || DEFAULT_CAMERAS),
    timedRecordingMs: readPositiveInt(env, 'TIMED_RECORDING_MS', 60_000),
    debug: env.RECORDER_DEBUG === 'true',
  };
}

export function parseCameras(value: string): CameraDescriptor[] {
  const cameras = value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0)
    .map(parseCamera);

  if (cameras.length === 0) {
    throw new ConfigurationError('CAMERAS must list at least one camera');
  }

  const ids = new Set<string>();
  for (const camera of cameras) {
    if (ids.has(camera.cameraId)) {
      throw new ConfigurationError(`Duplicate camera id in CAMERAS: ${camera.cameraId}`);
    }
    ids.add(camera.cameraId);
  }
  return cameras;
}

function parseCamera(entry: string): CameraDescriptor {
  // device 側に ':' を含められるよう先頭2つだけで区切る
  const [cameraId, position, ...rest] = entry.split(':');
  const device = rest.join(':');
  if (!cameraId || !position || !device) {
    throw new ConfigurationError(`Invalid camera entry (expected id:position:device): ${entry}`);
  }
  // 位置タグはファイル名の区切り文字 '_' を含められない
  if (position.includes('_')) {
    throw new ConfigurationError(`Camera position must not contain '_': ${position}`);
  }
  return { cameraId, position, device };
}

export function readPositiveInt(env: Env, name: string, defaultValue: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer: ${raw}`);
  }
  return value;
}
