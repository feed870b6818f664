import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import type { AppContainer } from './infrastructure/di/setupContainer.js';
import type { ServerConfig } from './infrastructure/config/serverConfig.js';
import { createCamerasRouter } from './presentation/routes/cameras.js';
import { createRecordingsRouter } from './presentation/routes/recordings.js';
import { createSegmentsRouter } from './presentation/routes/segments.js';
import { createCommandsRouter } from './presentation/routes/commands.js';
import { errorHandler } from './presentation/middleware/errorHandler.js';

/**
 * Expressアプリケーションを組み立てる
 */
export function createApp(container: AppContainer, config: ServerConfig): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: config.corsOrigin }));
  app.use(morgan(config.logLevel === 'debug' ? 'dev' : 'combined'));

  // API routes
  // NOTE: JSONボディを受け取るルーターは各自で express.json() を持つ
  app.use('/api', createCamerasRouter(container.cameraController));
  app.use('/api', createRecordingsRouter(container.recordingController));
  app.use('/api', createSegmentsRouter(container.segmentController));
  app.use('/api', createCommandsRouter(container.commandController));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      recording: container.recorder.isRecording(),
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not Found' });
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
