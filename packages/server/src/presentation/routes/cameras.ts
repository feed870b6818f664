import express from 'express';
import type { CameraController } from '../controllers/CameraController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Cameras Router
 */
export function createCamerasRouter(cameraController: CameraController): express.Router {
  const router = express.Router();

  /**
   * GET /api/cameras
   * 全カメラの状態を取得
   */
  router.get(
    '/cameras',
    asyncHandler(async (req, res) => {
      await cameraController.list(req, res);
    })
  );

  /**
   * GET /api/cameras/:id
   * カメラ単体の状態を取得
   */
  router.get(
    '/cameras/:id',
    asyncHandler(async (req, res) => {
      await cameraController.getById(req, res);
    })
  );

  return router;
}
