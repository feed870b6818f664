import type { SegmentFile } from '@dashcam/common-types';
import { parseSegmentFileName } from '@dashcam/recorder';
import type { ISegmentRepository } from '../../domain/repositories/ISegmentRepository.js';
import fs from 'fs/promises';
import path from 'path';

/**
 * ローカルファイルシステム Segment Repository の実装
 *
 * Storage Structure:
 * - /{basePath}/{yyyyMMdd_HHmmss}_{position}.mp4
 */
export class LocalFileSystemSegmentRepository implements ISegmentRepository {
  private basePath: string;

  constructor(basePath: string) {
    this.basePath = basePath;
  }

  async findAll(): Promise<SegmentFile[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.basePath);
    } catch (error) {
      if (isNotFound(error)) {
        // ディレクトリが存在しない場合は空配列を返す
        return [];
      }
      throw error;
    }

    const segments: SegmentFile[] = [];
    for (const fileName of entries) {
      const parsed = parseSegmentFileName(fileName);
      if (!parsed) {
        continue;
      }
      const filePath = path.join(this.basePath, fileName);
      try {
        const stats = await fs.stat(filePath);
        if (!stats.isFile()) {
          continue;
        }
        segments.push({
          fileName,
          path: filePath,
          cameraPosition: parsed.cameraPosition,
          startedAt: parsed.startedAt.toISOString(),
          size: stats.size,
        });
      } catch (error) {
        // 一覧取得後に削除されたファイル
        if (isNotFound(error)) {
          continue;
        }
        throw error;
      }
    }

    return segments.sort(
      (a, b) => b.startedAt.localeCompare(a.startedAt) || a.fileName.localeCompare(b.fileName)
    );
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
