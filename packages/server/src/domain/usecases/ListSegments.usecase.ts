import type { SegmentFile } from '@dashcam/common-types';
import type { ISegmentRepository } from '../repositories/ISegmentRepository.js';

/**
 * 保存済みセグメント一覧 Use Case（新しい順）
 */
export class ListSegmentsUseCase {
  private segmentRepository: ISegmentRepository;

  constructor(segmentRepository: ISegmentRepository) {
    this.segmentRepository = segmentRepository;
  }

  async execute(): Promise<SegmentFile[]> {
    return this.segmentRepository.findAll();
  }
}
