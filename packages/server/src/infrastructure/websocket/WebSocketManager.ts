/**
 * WebSocketManager - Socket.IO サーバー管理
 *
 * 接続中の全クライアントへ録画イベントを配信
 * - 録画開始 / 停止
 * - セグメント切替
 * - 録画エラー
 */

import { Server as SocketIOServer } from 'socket.io';
import type { Server as HTTPServer } from 'http';
import type {
  CameraId,
  RecordFailed,
  RecordStarted,
  RecordStopped,
  RecorderServerToClientEvents,
  SegmentSwitched,
} from '@dashcam/common-types';

/**
 * クライアントからサーバーへのイベント（現状なし。受信専用クライアント）
 */
interface ClientToServerEvents {}

/**
 * WebSocket Manager
 */
export class WebSocketManager {
  private io: SocketIOServer<ClientToServerEvents, RecorderServerToClientEvents> | null = null;

  /**
   * Socket.IOサーバーを初期化
   */
  initialize(httpServer: HTTPServer, corsOrigin: string): void {
    this.io = new SocketIOServer<ClientToServerEvents, RecorderServerToClientEvents>(httpServer, {
      cors: {
        origin: corsOrigin,
        methods: ['GET', 'POST'],
      },
    });

    this.io.on('connection', (socket) => {
      console.log(`🔌 [WebSocket] Client connected: ${socket.id}`);
      socket.on('disconnect', () => {
        console.log(`🔌 [WebSocket] Client disconnected: ${socket.id}`);
      });
    });

    console.log('✅ [WebSocket] Socket.IO server initialized');
  }

  emitRecordStarted(cameraId: CameraId): void {
    const io = this.getInitializedIO('record_started');
    const message: RecordStarted = { cameraId, timestamp: Date.now() };
    io?.emit('record_started', message);
  }

  emitSegmentSwitched(cameraId: CameraId, segmentIndex: number): void {
    const io = this.getInitializedIO('segment_switched');
    const message: SegmentSwitched = { cameraId, segmentIndex, timestamp: Date.now() };
    io?.emit('segment_switched', message);
  }

  emitRecordStopped(cameraId: CameraId): void {
    const io = this.getInitializedIO('record_stopped');
    const message: RecordStopped = { cameraId, timestamp: Date.now() };
    io?.emit('record_stopped', message);
  }

  emitRecordError(cameraId: CameraId, errorMessage: string): void {
    const io = this.getInitializedIO('record_error');
    const message: RecordFailed = { cameraId, message: errorMessage, timestamp: Date.now() };
    io?.emit('record_error', message);
  }

  /**
   * 全接続を切断してサーバーを閉じる
   */
  close(): Promise<void> {
    const io = this.io;
    this.io = null;
    if (!io) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      io.close(() => resolve());
    });
  }

  private getInitializedIO(
    event: keyof RecorderServerToClientEvents
  ): SocketIOServer<ClientToServerEvents, RecorderServerToClientEvents> | null {
    if (!this.io) {
      console.warn(`⚠️ [WebSocket] Not initialized, cannot emit ${event}`);
      return null;
    }
    console.log(`📡 [WebSocket] Emitting ${event}`);
    return this.io;
  }
}

// シングルトンインスタンス
let instance: WebSocketManager | null = null;

export function getWebSocketManager(): WebSocketManager {
  if (!instance) {
    instance = new WebSocketManager();
  }
  return instance;
}
