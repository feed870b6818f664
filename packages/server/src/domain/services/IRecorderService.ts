import type {
  CameraId,
  CameraStatus,
  StartRecordingRequest,
  StartedCamera,
} from '@dashcam/common-types';

/**
 * IRecorderService - Use Case から見た録画機能
 *
 * 実装: MultiCameraRecorder (@dashcam/recorder)
 */
export interface IRecorderService {
  /**
   * 全カメラの録画を開始
   * 録画中なら RecorderBusyError
   */
  startAll(request?: StartRecordingRequest): Promise<StartedCamera[]>;

  stopAll(): Promise<void>;

  isRecording(): boolean;

  getStatus(): CameraStatus[];

  /**
   * 見つからなければ CameraNotFoundError
   */
  getCamera(cameraId: CameraId): CameraStatus;
}
