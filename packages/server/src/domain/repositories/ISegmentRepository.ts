import type { SegmentFile } from '@dashcam/common-types';

/**
 * Segment Repository Interface
 *
 * 保存先ディレクトリにある録画セグメントの一覧を抽象化
 * 実装: LocalFileSystemSegmentRepository
 */
export interface ISegmentRepository {
  /**
   * 命名規則に合うセグメントを新しい順に返す
   */
  findAll(): Promise<SegmentFile[]>;
}
