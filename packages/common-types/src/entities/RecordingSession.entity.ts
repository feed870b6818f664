import type { CameraId } from '../camera.js';
import type {
  RecordingSessionSnapshot,
  SegmentTarget,
  SegmentedRecordingState,
} from '../recording.js';
import { InvalidStateTransitionError } from '../errors/DomainErrors.js';

/**
 * RecordingSession ドメインエンティティ（1カメラ分のライブ状態）
 *
 * ビジネスルール:
 * - prepare は idle からのみ
 * - start は prepared / awaiting_reconfiguration からのみ
 * - セグメント切替は recording からのみ、segmentIndex はちょうど1ずつ増える
 * - isRecording と awaitingReconfiguration は同時に true にならない（単一の state から導出）
 * - reset で全フィールドが初期値に戻る
 */
export class RecordingSessionEntity {
  private state: SegmentedRecordingState = 'idle';
  private segmentIndex = 0;
  private currentFilePath: string | null = null;
  private target: SegmentTarget | null = null;

  private constructor(private readonly cameraId: CameraId) {}

  static create(cameraId: CameraId): RecordingSessionEntity {
    return new RecordingSessionEntity(cameraId);
  }

  /**
   * ビジネスルール: 最初のセグメントの準備
   * idle 状態からのみ遷移可能
   */
  prepare(filePath: string, target: SegmentTarget): void {
    if (this.state !== 'idle') {
      throw new InvalidStateTransitionError(
        `Cannot prepare from state: ${this.state}. Must be in 'idle' state.`
      );
    }
    this.target = { ...target };
    this.segmentIndex = 0;
    this.currentFilePath = filePath;
    this.state = 'prepared';
  }

  /**
   * ビジネスルール: 録画開始（初回 / 再バインド後の再開）
   */
  startRecording(): void {
    if (this.state !== 'prepared' && this.state !== 'awaiting_reconfiguration') {
      throw new InvalidStateTransitionError(
        `Cannot start recording from state: ${this.state}. Must be in 'prepared' or 'awaiting_reconfiguration' state.`
      );
    }
    this.state = 'recording';
  }

  /**
   * ビジネスルール: 次のセグメントへ進む
   * recording 状態からのみ。新しいインデックスを返す
   */
  advanceSegment(nextFilePath: string): number {
    if (this.state !== 'recording') {
      throw new InvalidStateTransitionError(
        `Cannot switch segment from state: ${this.state}. Must be in 'recording' state.`
      );
    }
    this.segmentIndex += 1;
    this.currentFilePath = nextFilePath;
    this.state = 'awaiting_reconfiguration';
    return this.segmentIndex;
  }

  /**
   * 全フィールドを idle の初期値に戻す（どの状態からでも可）
   */
  reset(): void {
    this.state = 'idle';
    this.segmentIndex = 0;
    this.currentFilePath = null;
    this.target = null;
  }

  isRecording(): boolean {
    return this.state === 'recording';
  }

  isAwaitingReconfiguration(): boolean {
    return this.state === 'awaiting_reconfiguration';
  }

  /**
   * 最初のセグメントかどうか（onRecordStart の判定用）
   */
  isFirstSegment(): boolean {
    return this.segmentIndex === 0;
  }

  // Getters
  getCameraId(): CameraId {
    return this.cameraId;
  }

  getState(): SegmentedRecordingState {
    return this.state;
  }

  getSegmentIndex(): number {
    return this.segmentIndex;
  }

  getCurrentFilePath(): string | null {
    return this.currentFilePath;
  }

  getTarget(): SegmentTarget | null {
    return this.target;
  }

  /**
   * スナップショットへの変換
   */
  toSnapshot(): RecordingSessionSnapshot {
    return {
      cameraId: this.cameraId,
      state: this.state,
      isRecording: this.isRecording(),
      awaitingReconfiguration: this.isAwaitingReconfiguration(),
      segmentIndex: this.segmentIndex,
      currentFilePath: this.currentFilePath,
      target: this.target ? { ...this.target } : null,
    };
  }
}
