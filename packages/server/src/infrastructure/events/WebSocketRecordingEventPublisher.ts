/**
 * WebSocketRecordingEventPublisher - WebSocket経由で録画イベントを発行
 *
 * IRecordingEventSink の実装。MultiCameraRecorder の observer として登録する
 */

import type { CameraId } from '@dashcam/common-types';
import type { IRecordingEventSink } from '@dashcam/recorder';
import type { WebSocketManager } from '../websocket/WebSocketManager.js';

export class WebSocketRecordingEventPublisher implements IRecordingEventSink {
  private webSocketManager: WebSocketManager;

  constructor(webSocketManager: WebSocketManager) {
    this.webSocketManager = webSocketManager;
  }

  onRecordStart(cameraId: CameraId): void {
    this.webSocketManager.emitRecordStarted(cameraId);
  }

  onSegmentSwitch(cameraId: CameraId, newSegmentIndex: number): void {
    this.webSocketManager.emitSegmentSwitched(cameraId, newSegmentIndex);
  }

  onRecordStop(cameraId: CameraId): void {
    this.webSocketManager.emitRecordStopped(cameraId);
  }

  onRecordError(cameraId: CameraId, message: string): void {
    this.webSocketManager.emitRecordError(cameraId, message);
  }
}
