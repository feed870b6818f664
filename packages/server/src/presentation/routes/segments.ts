import express from 'express';
import type { SegmentController } from '../controllers/SegmentController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Segments Router
 */
export function createSegmentsRouter(segmentController: SegmentController): express.Router {
  const router = express.Router();

  /**
   * GET /api/segments
   * 保存済みセグメント一覧（新しい順）
   */
  router.get(
    '/segments',
    asyncHandler(async (req, res) => {
      await segmentController.list(req, res);
    })
  );

  return router;
}
