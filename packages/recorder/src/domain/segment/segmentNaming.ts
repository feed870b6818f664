import path from 'path';
import { UNKNOWN_CAMERA_POSITION } from '@dashcam/common-types';
import type { CameraPosition } from '@dashcam/common-types';

/**
 * セグメントファイル名の規約: {yyyyMMdd_HHmmss}_{cameraPosition}.mp4
 * 下流のツールがこの形式に依存しているため変更しないこと
 */
const SEGMENT_EXTENSION = '.mp4';
const SEGMENT_FILE_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})_([^_]+)\.mp4$/;

export interface ParsedSegmentTarget {
  saveDirectory: string;
  cameraPosition: CameraPosition;
}

export interface ParsedSegmentFileName {
  startedAt: Date;
  cameraPosition: CameraPosition;
}

const pad = (value: number, length = 2): string => String(value).padStart(length, '0');

/**
 * ローカル時刻を yyyyMMdd_HHmmss に整形
 */
export function formatSegmentTimestamp(date: Date): string {
  return (
    `${pad(date.getFullYear(), 4)}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * 最初に渡されたパスから保存先ディレクトリとカメラ位置を取り出す
 *
 * 位置タグは最後の "_" の後ろから末尾の ".mp4" の手前まで。
 * 形式に合わない場合は "unknown"
 */
export function parseSegmentTarget(filePath: string): ParsedSegmentTarget {
  const saveDirectory = path.dirname(filePath);
  const fileName = path.basename(filePath);
  const lastUnderscore = fileName.lastIndexOf('_');

  let cameraPosition: CameraPosition = UNKNOWN_CAMERA_POSITION;
  if (lastUnderscore > 0 && fileName.endsWith(SEGMENT_EXTENSION)) {
    const tag = fileName.slice(lastUnderscore + 1, fileName.length - SEGMENT_EXTENSION.length);
    if (tag.length > 0) {
      cameraPosition = tag;
    }
  }

  return { saveDirectory, cameraPosition };
}

/**
 * 次のセグメントのパスを生成（呼び出しごとに現在時刻を使う）
 * 同一秒内の衝突は許容（既知の制約）
 */
export function generateSegmentPath(
  saveDirectory: string,
  cameraPosition: CameraPosition,
  now: Date = new Date()
): string {
  const fileName = `${formatSegmentTimestamp(now)}_${cameraPosition}${SEGMENT_EXTENSION}`;
  return path.join(saveDirectory, fileName);
}

/**
 * 規約に沿ったファイル名を解析。合わなければ null
 */
export function parseSegmentFileName(fileName: string): ParsedSegmentFileName | null {
  const match = SEGMENT_FILE_PATTERN.exec(fileName);
  if (!match) {
    return null;
  }

  const [, year, month, day, hours, minutes, seconds, cameraPosition] = match;
  const startedAt = new Date(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hours),
    Number(minutes),
    Number(seconds)
  );

  // 20241340_... のような存在しない日時は Date が繰り上げてしまうので弾く
  if (formatSegmentTimestamp(startedAt) !== `${year}${month}${day}_${hours}${minutes}${seconds}`) {
    return null;
  }

  return { startedAt, cameraPosition };
}
