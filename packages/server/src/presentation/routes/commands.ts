import express from 'express';
import type { CommandController } from '../controllers/CommandController.js';
import { asyncHandler } from '../middleware/errorHandler.js';

/**
 * Commands Router
 *
 * NOTE: JSONデータを扱うため、express.json()ミドルウェアを使用
 */
export function createCommandsRouter(commandController: CommandController): express.Router {
  const router = express.Router();

  /**
   * POST /api/commands
   * チャットのメッセージをコマンドとして実行
   */
  router.post(
    '/commands',
    express.json(),
    asyncHandler(async (req, res) => {
      await commandController.execute(req, res);
    })
  );

  return router;
}
