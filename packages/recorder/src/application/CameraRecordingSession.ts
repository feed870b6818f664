import type { CameraDescriptor, CameraId, CameraStatus } from '@dashcam/common-types';
import type { EncoderBackendFactory } from '../domain/services/IEncoderBackend.js';
import type { ICaptureSession } from '../domain/services/ICaptureSession.js';
import type { IRecordingEventSink } from '../domain/events/IRecordingEventSink.js';
import type { ExecutionContext } from '../infrastructure/scheduling/ExecutionContext.js';
import { describeError } from '../shared/describeError.js';
import { SegmentedRecordingController } from './SegmentedRecordingController.js';

export interface CameraRecordingSessionOptions {
  camera: CameraDescriptor;
  width: number;
  height: number;
  capture: ICaptureSession;
  createEncoder: EncoderBackendFactory;
  segmentDurationMs?: number;
  eventContext?: ExecutionContext;
  clock?: () => Date;
}

/**
 * CameraRecordingSession - 1台のカメラのキャプチャと録画コントローラーを束ねる
 *
 * コントローラーのイベントを受ける所有者。セグメント切替のたびに
 * 新しい入力サーフェスをキャプチャへ再バインドしてから録画を再開する
 */
export class CameraRecordingSession implements IRecordingEventSink {
  private readonly camera: CameraDescriptor;
  private readonly width: number;
  private readonly height: number;
  private readonly capture: ICaptureSession;
  private readonly controller: SegmentedRecordingController;
  private readonly observers = new Set<IRecordingEventSink>();

  constructor(options: CameraRecordingSessionOptions) {
    this.camera = options.camera;
    this.width = options.width;
    this.height = options.height;
    this.capture = options.capture;
    this.controller = new SegmentedRecordingController({
      cameraId: options.camera.cameraId,
      createEncoder: options.createEncoder,
      eventSink: this,
      eventContext: options.eventContext,
      segmentDurationMs: options.segmentDurationMs,
      clock: options.clock,
    });
  }

  /**
   * 最初のセグメントを準備し、キャプチャをつないで録画を開始する
   */
  async begin(initialPath: string): Promise<boolean> {
    const prepared = await this.controller.prepare(initialPath, this.width, this.height);
    if (!prepared) {
      return false;
    }

    this.syncSurface();
    if (!this.capture.isRunning()) {
      try {
        await this.capture.start();
      } catch (error) {
        this.capture.rebindSurface(null);
        await this.controller.release();
        const message = `Failed to start capture: ${describeError(error)}`;
        console.error(`❌ [CameraRecordingSession] ${this.camera.cameraId} ${message}`);
        this.notify((observer) => observer.onRecordError(this.camera.cameraId, message));
        return false;
      }
    }

    return this.controller.start();
  }

  /**
   * 録画を停止する。キャプチャは次の begin のために動かしたまま
   */
  async end(): Promise<void> {
    await this.controller.stop();
    this.syncSurface();
  }

  async dispose(): Promise<void> {
    await this.controller.release();
    this.capture.rebindSurface(null);
    await this.capture.stop();
    this.observers.clear();
  }

  addObserver(observer: IRecordingEventSink): () => void {
    this.observers.add(observer);
    return () => {
      this.observers.delete(observer);
    };
  }

  /**
   * キューに積まれた操作の完了を待つ
   */
  whenIdle(): Promise<void> {
    return this.controller.whenIdle();
  }

  isRecording(): boolean {
    return this.controller.isRecording();
  }

  /**
   * 録画中またはセグメント切替の途中
   */
  isActive(): boolean {
    return this.controller.isRecording() || this.controller.isAwaitingReconfiguration();
  }

  getCameraId(): CameraId {
    return this.camera.cameraId;
  }

  getCamera(): CameraDescriptor {
    return this.camera;
  }

  getStatus(): CameraStatus {
    return {
      ...this.camera,
      captureRunning: this.capture.isRunning(),
      deliveredFrames: this.capture.getDeliveredFrameCount(),
      droppedFrames: this.capture.getDroppedFrameCount(),
      session: this.controller.getSnapshot(),
    };
  }

  // IRecordingEventSink
  onRecordStart(cameraId: CameraId): void {
    this.notify((observer) => observer.onRecordStart(cameraId));
  }

  onSegmentSwitch(cameraId: CameraId, newSegmentIndex: number): void {
    this.syncSurface();
    console.log(`🔗 [CameraRecordingSession] ${cameraId} rebound surface for segment ${newSegmentIndex}`);
    this.notify((observer) => observer.onSegmentSwitch(cameraId, newSegmentIndex));

    // 再開の失敗はコントローラー自身が onRecordError で通知する
    this.controller.start().catch((error: unknown) => {
      console.error(`❌ [CameraRecordingSession] ${cameraId} failed to resume recording:`, error);
    });
  }

  onRecordStop(cameraId: CameraId): void {
    this.syncSurface();
    this.notify((observer) => observer.onRecordStop(cameraId));
  }

  onRecordError(cameraId: CameraId, message: string): void {
    this.syncSurface();
    this.notify((observer) => observer.onRecordError(cameraId, message));
  }

  /**
   * キャプチャの書き込み先をコントローラーが現在保持するサーフェスに合わせる
   * イベントは遅れて届くため、その時点で次の録画が準備済みならそちらを残す
   */
  private syncSurface(): void {
    this.capture.rebindSurface(this.controller.getInputSurface());
  }

  private notify(deliver: (observer: IRecordingEventSink) => void): void {
    for (const observer of this.observers) {
      try {
        deliver(observer);
      } catch (error) {
        console.error(`❌ [CameraRecordingSession] ${this.camera.cameraId} observer failed:`, error);
      }
    }
  }
}
