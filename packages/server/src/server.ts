import dotenv from 'dotenv';
import { createServer } from 'http';
import { getRecorderConfig } from '@dashcam/recorder';
import { getServerConfig } from './infrastructure/config/serverConfig.js';
import { setupContainer } from './infrastructure/di/setupContainer.js';
import { getWebSocketManager } from './infrastructure/websocket/WebSocketManager.js';
import { WebSocketRecordingEventPublisher } from './infrastructure/events/WebSocketRecordingEventPublisher.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

const serverConfig = getServerConfig();
const recorderConfig = getRecorderConfig();

// Initialize container
const container = setupContainer(recorderConfig);
const app = createApp(container, serverConfig);

// Create HTTP server
const httpServer = createServer(app);

// Initialize WebSocket
const webSocketManager = getWebSocketManager();
webSocketManager.initialize(httpServer, serverConfig.corsOrigin);

// 録画イベントを全クライアントへ配信
container.recorder.addObserver(new WebSocketRecordingEventPublisher(webSocketManager));

// Start server
httpServer.listen(serverConfig.port, () => {
  console.log(`🚀 Server running on http://localhost:${serverConfig.port}`);
  console.log(`📝 Log level: ${serverConfig.logLevel}`);
  console.log(`🌐 CORS origin: ${serverConfig.corsOrigin}`);
  console.log(`🎞️ Segment duration: ${recorderConfig.segmentDurationMs}ms`);
});

// Graceful shutdown
let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  console.log(`👋 ${signal} received, shutting down gracefully...`);

  // 録画中のセグメントを確定させてからソケットを閉じる
  await container.recorder.shutdown();
  await webSocketManager.close();
  httpServer.close(() => {
    console.log('✅ Server closed');
    process.exit(0);
  });
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      console.error('❌ [Server] Shutdown failed:', error);
      process.exit(1);
    });
  });
}
