import express from 'express';
import type { RecordingController } from '../controllers/RecordingController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Recordings Router
 *
 * NOTE: JSONデータを扱うため、express.json()ミドルウェアを使用
 */
export function createRecordingsRouter(recordingController: RecordingController): express.Router {
  const router = express.Router();

  // JSONデータをパース
  const jsonParser = express.json();

  /**
   * POST /api/recordings
   * 全カメラの録画を開始（durationMs 指定で時限録画）
   */
  router.post(
    '/recordings',
    jsonParser,
    asyncHandler(async (req, res) => {
      await recordingController.start(req, res);
    })
  );

  /**
   * POST /api/recordings/stop
   * 全カメラの録画を停止
   */
  router.post(
    '/recordings/stop',
    asyncHandler(async (req, res) => {
      await recordingController.stop(req, res);
    })
  );

  return router;
}
