import { CameraNotFoundError, InvalidOperationError, RecorderBusyError } from '@dashcam/common-types';
import type {
  CameraId,
  CameraStatus,
  StartRecordingRequest,
  StartedCamera,
} from '@dashcam/common-types';
import type { IRecordingEventSink } from '../domain/events/IRecordingEventSink.js';
import { generateSegmentPath } from '../domain/segment/segmentNaming.js';
import type { CameraRecordingSession } from './CameraRecordingSession.js';

export interface MultiCameraRecorderOptions {
  sessions: CameraRecordingSession[];
  saveDirectory: string;
  clock?: () => Date;
}

/**
 * MultiCameraRecorder - 全カメラの録画をまとめて開始・停止する
 *
 * 同時に始めたセグメントは同じタイムスタンプを持つ
 * （例: 20240101_120000_front.mp4 と 20240101_120000_back.mp4）
 */
export class MultiCameraRecorder {
  private readonly sessions: Map<CameraId, CameraRecordingSession>;
  private readonly saveDirectory: string;
  private readonly clock: () => Date;
  private timedStop: ReturnType<typeof setTimeout> | null = null;
  private starting = false;

  constructor(options: MultiCameraRecorderOptions) {
    this.sessions = new Map(options.sessions.map((session) => [session.getCameraId(), session]));
    this.saveDirectory = options.saveDirectory;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * 全カメラの録画を開始する
   * durationMs 指定時は経過後に自動停止
   */
  async startAll(request: StartRecordingRequest = {}): Promise<StartedCamera[]> {
    const { durationMs } = request;
    if (durationMs !== undefined && (!Number.isInteger(durationMs) || durationMs <= 0)) {
      throw new InvalidOperationError(`durationMs must be a positive integer: ${durationMs}`);
    }
    if (this.starting || this.isRecording()) {
      throw new RecorderBusyError('Recording is already in progress');
    }

    this.starting = true;
    // 前回の時間指定録画が stopAll を経ずに終わっていた場合の残りタイマー
    this.cancelTimedStop();
    try {
      const now = this.clock();
      const started: StartedCamera[] = [];
      for (const session of this.sessions.values()) {
        const filePath = generateSegmentPath(this.saveDirectory, session.getCamera().position, now);
        if (await session.begin(filePath)) {
          started.push({ cameraId: session.getCameraId(), filePath });
        }
      }

      console.log(`🎬 [MultiCameraRecorder] Started ${started.length}/${this.sessions.size} cameras`);
      if (durationMs !== undefined && started.length > 0) {
        this.scheduleTimedStop(durationMs);
      }
      return started;
    } finally {
      this.starting = false;
    }
  }

  async stopAll(): Promise<void> {
    this.cancelTimedStop();
    await Promise.all([...this.sessions.values()].map((session) => session.end()));
    console.log('🛑 [MultiCameraRecorder] Stopped all cameras');
  }

  isRecording(): boolean {
    return [...this.sessions.values()].some((session) => session.isActive());
  }

  getStatus(): CameraStatus[] {
    return [...this.sessions.values()].map((session) => session.getStatus());
  }

  getCamera(cameraId: CameraId): CameraStatus {
    const session = this.sessions.get(cameraId);
    if (!session) {
      throw new CameraNotFoundError(`Camera not found: ${cameraId}`);
    }
    return session.getStatus();
  }

  /**
   * 全カメラのイベントを購読する。戻り値で購読解除
   */
  addObserver(observer: IRecordingEventSink): () => void {
    const unsubscribers = [...this.sessions.values()].map((session) => session.addObserver(observer));
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  hasTimedStop(): boolean {
    return this.timedStop !== null;
  }

  async shutdown(): Promise<void> {
    this.cancelTimedStop();
    await Promise.all([...this.sessions.values()].map((session) => session.dispose()));
    console.log('👋 [MultiCameraRecorder] Shut down');
  }

  private scheduleTimedStop(durationMs: number): void {
    this.cancelTimedStop();
    console.log(`⏱️ [MultiCameraRecorder] Recording will stop in ${durationMs}ms`);
    this.timedStop = setTimeout(() => {
      this.timedStop = null;
      this.stopAll().catch((error: unknown) => {
        console.error('❌ [MultiCameraRecorder] Timed stop failed:', error);
      });
    }, durationMs);
  }

  private cancelTimedStop(): void {
    if (this.timedStop) {
      clearTimeout(this.timedStop);
      this.timedStop = null;
    }
  }
}
