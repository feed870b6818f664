import {
  EncoderPrepareError,
  EncoderStartError,
  RecordingSessionEntity,
  SEGMENT_DURATION_MS,
  SegmentRotationError,
} from '@dashcam/common-types';
import type {
  CameraId,
  RecordingSessionSnapshot,
  SegmentedRecordingState,
} from '@dashcam/common-types';
import type {
  BackendResult,
  EncoderBackendFactory,
  IEncoderBackend,
  InputSurface,
} from '../domain/services/IEncoderBackend.js';
import { backendFailure } from '../domain/services/IEncoderBackend.js';
import type { IRecordingEventSink } from '../domain/events/IRecordingEventSink.js';
import { generateSegmentPath, parseSegmentTarget } from '../domain/segment/segmentNaming.js';
import { SerialTaskQueue } from '../infrastructure/scheduling/SerialTaskQueue.js';
import { RotationTimer } from '../infrastructure/scheduling/RotationTimer.js';
import { immediateContext } from '../infrastructure/scheduling/ExecutionContext.js';
import type { ExecutionContext } from '../infrastructure/scheduling/ExecutionContext.js';
import { describeError } from '../shared/describeError.js';

export interface SegmentedRecordingControllerOptions {
  cameraId: CameraId;
  createEncoder: EncoderBackendFactory;
  eventSink: IRecordingEventSink;
  /** 全操作を直列化するキュー（省略時は専用のものを生成） */
  controlQueue?: SerialTaskQueue;
  /** イベント配信先（省略時は setImmediate） */
  eventContext?: ExecutionContext;
  segmentDurationMs?: number;
  clock?: () => Date;
}

/**
 * SegmentedRecordingController - 1台のカメラのセグメント録画を駆動する状態機械
 *
 * 状態: idle → prepared → recording ⇄ awaiting_reconfiguration
 *
 * - タイマー発火で現在のエンコーダーを停止・解放し、次のセグメント用に
 *   新しいエンコーダー（= 新しい入力サーフェス）を準備して止まる
 * - 新しいサーフェスをキャプチャセッションへ再バインドするのは所有者の責務。
 *   所有者は onSegmentSwitch を受けて再バインドした後に start() を呼ぶ
 * - 公開操作は例外を投げない。失敗は戻り値と onRecordError で伝える
 */
export class SegmentedRecordingController {
  private readonly cameraId: CameraId;
  private readonly session: RecordingSessionEntity;
  private readonly createEncoder: EncoderBackendFactory;
  private readonly eventSink: IRecordingEventSink;
  private readonly queue: SerialTaskQueue;
  private readonly eventContext: ExecutionContext;
  private readonly rotationTimer: RotationTimer;
  private readonly segmentDurationMs: number;
  private readonly clock: () => Date;
  private encoder: IEncoderBackend | null = null;

  constructor(options: SegmentedRecordingControllerOptions) {
    this.cameraId = options.cameraId;
    this.session = RecordingSessionEntity.create(options.cameraId);
    this.createEncoder = options.createEncoder;
    this.eventSink = options.eventSink;
    this.queue = options.controlQueue ?? new SerialTaskQueue();
    this.eventContext = options.eventContext ?? immediateContext;
    this.rotationTimer = new RotationTimer(this.queue);
    this.segmentDurationMs = options.segmentDurationMs ?? SEGMENT_DURATION_MS;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * 最初のセグメントを準備（開始はしない）
   * idle 以外では何もせず false
   */
  prepare(filePath: string, width: number, height: number): Promise<boolean> {
    return this.queue.enqueue(() => this.prepareFirstSegment(filePath, width, height));
  }

  /**
   * 準備済みのエンコーダーで録画を開始（初回 / セグメント切替後の再開）
   */
  start(): Promise<boolean> {
    return this.queue.enqueue(() => this.startEncoder());
  }

  stop(): Promise<void> {
    return this.queue.enqueue(() => this.stopRecording());
  }

  /**
   * どの状態からでも使える冪等な後始末
   */
  release(): Promise<void> {
    return this.queue.enqueue(() => this.releaseAll());
  }

  /**
   * キューに積まれた操作がすべて完了するまで待つ
   */
  whenIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  // Getters
  getCameraId(): CameraId {
    return this.cameraId;
  }

  isRecording(): boolean {
    return this.session.isRecording();
  }

  isAwaitingReconfiguration(): boolean {
    return this.session.isAwaitingReconfiguration();
  }

  getSegmentIndex(): number {
    return this.session.getSegmentIndex();
  }

  getCurrentFilePath(): string | null {
    return this.session.getCurrentFilePath();
  }

  getState(): SegmentedRecordingState {
    return this.session.getState();
  }

  getSnapshot(): RecordingSessionSnapshot {
    return this.session.toSnapshot();
  }

  /**
   * 現在保持しているエンコーダーの入力サーフェス
   */
  getInputSurface(): InputSurface | null {
    return this.encoder ? this.encoder.inputSurfaceHandle() : null;
  }

  private async prepareFirstSegment(filePath: string, width: number, height: number): Promise<boolean> {
    if (this.session.getState() !== 'idle') {
      console.warn(
        `⚠️ [SegmentedRecordingController] ${this.cameraId} cannot prepare in state: ${this.session.getState()}`
      );
      return false;
    }

    // 古いエンコーダーが残っていれば先に解放
    await this.releaseEncoder();

    const { saveDirectory, cameraPosition } = parseSegmentTarget(filePath);
    const result = await this.prepareEncoder(filePath, width, height);
    if (!result.ok) {
      await this.releaseEncoder();
      this.session.reset();
      this.reportError(new EncoderPrepareError(result.error));
      return false;
    }

    this.session.prepare(filePath, { saveDirectory, cameraPosition, width, height });
    console.log(`📝 [SegmentedRecordingController] ${this.cameraId} prepared recording to: ${filePath}`);
    return true;
  }

  private async startEncoder(): Promise<boolean> {
    const encoder = this.encoder;
    if (!encoder) {
      console.error(`❌ [SegmentedRecordingController] ${this.cameraId} encoder not prepared`);
      return false;
    }
    if (this.session.isRecording()) {
      console.warn(`⚠️ [SegmentedRecordingController] ${this.cameraId} is already recording`);
      return false;
    }
    if (this.session.getState() === 'idle') {
      return false;
    }

    const result = await this.invokeBackend(() => encoder.start());
    if (!result.ok) {
      await this.releaseEncoder();
      this.session.reset();
      this.reportError(new EncoderStartError(result.error));
      return false;
    }

    const isFirstSegment = this.session.isFirstSegment();
    this.session.startRecording();
    this.rotationTimer.schedule(this.segmentDurationMs, () => this.rotateSegment());
    console.log(
      `🎬 [SegmentedRecordingController] ${this.cameraId} started segment ${this.session.getSegmentIndex()}`
    );

    // 開始通知は最初のセグメントのみ
    if (isFirstSegment) {
      this.emit((sink) => sink.onRecordStart(this.cameraId));
    }
    return true;
  }

  /**
   * タイマー発火時のセグメント切替（キュー上で実行される）
   */
  private async rotateSegment(): Promise<void> {
    if (!this.session.isRecording()) {
      return;
    }
    console.log(`🔄 [SegmentedRecordingController] ${this.cameraId} switching to next segment`);

    try {
      await this.stopEncoderBestEffort();
      await this.releaseEncoder();

      const target = this.session.getTarget();
      if (!target) {
        throw new Error('Recording target is not set');
      }

      const nextPath = generateSegmentPath(target.saveDirectory, target.cameraPosition, this.clock());
      const result = await this.prepareEncoder(nextPath, target.width, target.height);
      if (!result.ok) {
        throw new Error(result.error);
      }

      const segmentIndex = this.session.advanceSegment(nextPath);
      console.log(
        `⏸️ [SegmentedRecordingController] ${this.cameraId} prepared segment ${segmentIndex}: ${nextPath}, waiting for session reconfiguration`
      );
      this.emit((sink) => sink.onSegmentSwitch(this.cameraId, segmentIndex));
    } catch (error) {
      // 中途半端に準備されたエンコーダーも含めて完全に解放し idle に戻す
      this.rotationTimer.cancel();
      await this.releaseEncoder();
      this.session.reset();
      this.reportError(new SegmentRotationError(`Failed to switch segment: ${describeError(error)}`));
    }
  }

  private async stopRecording(): Promise<void> {
    this.rotationTimer.cancel();

    // 切替中は既にエンコーダーが停止済み。準備だけされたものを解放する
    if (this.session.isAwaitingReconfiguration()) {
      console.log(
        `🛑 [SegmentedRecordingController] ${this.cameraId} is waiting for session reconfiguration, skipping encoder stop`
      );
      await this.releaseEncoder();
      this.session.reset();
      this.emit((sink) => sink.onRecordStop(this.cameraId));
      return;
    }

    if (!this.session.isRecording()) {
      console.warn(`⚠️ [SegmentedRecordingController] ${this.cameraId} is not recording`);
      return;
    }

    const lastPath = this.session.getCurrentFilePath();
    const totalSegments = this.session.getSegmentIndex() + 1;
    await this.stopEncoderBestEffort();
    await this.releaseEncoder();
    this.session.reset();
    console.log(
      `🛑 [SegmentedRecordingController] ${this.cameraId} stopped recording: ${lastPath} (total segments: ${totalSegments})`
    );
    this.emit((sink) => sink.onRecordStop(this.cameraId));
  }

  private async releaseAll(): Promise<void> {
    this.rotationTimer.cancel();

    if (this.session.isRecording() && this.encoder) {
      await this.stopRecording();
      return;
    }

    await this.releaseEncoder();
    this.session.reset();
  }

  /**
   * 新しいエンコーダーを生成して準備する。生成したものは失敗時も this.encoder に保持し、
   * 呼び出し側が解放する
   */
  private async prepareEncoder(filePath: string, width: number, height: number): Promise<BackendResult> {
    try {
      this.encoder = this.createEncoder();
    } catch (error) {
      return backendFailure(describeError(error));
    }
    const encoder = this.encoder;
    return this.invokeBackend(() => encoder.prepare(filePath, width, height));
  }

  /**
   * 停止に失敗しても停止済みとして扱う
   */
  private async stopEncoderBestEffort(): Promise<void> {
    const encoder = this.encoder;
    if (!encoder) {
      return;
    }
    const result = await this.invokeBackend(() => encoder.stop());
    if (!result.ok) {
      console.error(`❌ [SegmentedRecordingController] ${this.cameraId} error stopping encoder: ${result.error}`);
    }
  }

  private async releaseEncoder(): Promise<void> {
    const encoder = this.encoder;
    if (!encoder) {
      return;
    }
    this.encoder = null;
    try {
      await encoder.release();
    } catch (error) {
      console.error(`❌ [SegmentedRecordingController] ${this.cameraId} error releasing encoder:`, error);
    }
  }

  /**
   * バックエンドが例外を投げても結果値に変換する
   */
  private async invokeBackend(call: () => Promise<BackendResult>): Promise<BackendResult> {
    try {
      return await call();
    } catch (error) {
      return backendFailure(describeError(error));
    }
  }

  private reportError(error: EncoderPrepareError | EncoderStartError | SegmentRotationError): void {
    console.error(`❌ [SegmentedRecordingController] ${this.cameraId} ${error.code}: ${error.message}`);
    this.emit((sink) => sink.onRecordError(this.cameraId, error.message));
  }

  private emit(deliver: (sink: IRecordingEventSink) => void): void {
    this.eventContext.post(() => deliver(this.eventSink));
  }
}
