import type { Request, Response } from 'express';
import type { ListSegmentsUseCase } from '../../domain/usecases/ListSegments.usecase.js';

/**
 * Segment Controller
 */
export class SegmentController {
  private listSegmentsUseCase: ListSegmentsUseCase;

  constructor(listSegmentsUseCase: ListSegmentsUseCase) {
    this.listSegmentsUseCase = listSegmentsUseCase;
  }

  async list(_req: Request, res: Response): Promise<void> {
    const segments = await this.listSegmentsUseCase.execute();
    res.json({ segments });
  }
}
