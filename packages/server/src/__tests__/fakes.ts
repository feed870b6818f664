import { vi } from 'vitest';
import type {
  CameraId,
  CameraStatus,
  SegmentedRecordingState,
  StartRecordingRequest,
  StartedCamera,
} from '@dashcam/common-types';
import type { IRecorderService } from '../domain/services/IRecorderService.js';

/**
 * テスト用: vi.fn で差し替えられる録画サービス
 */
export function createFakeRecorder() {
  return {
    startAll: vi.fn<(request?: StartRecordingRequest) => Promise<StartedCamera[]>>().mockResolvedValue([]),
    stopAll: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    isRecording: vi.fn<() => boolean>().mockReturnValue(false),
    getStatus: vi.fn<() => CameraStatus[]>().mockReturnValue([]),
    getCamera: vi.fn<(cameraId: CameraId) => CameraStatus>(),
  } satisfies IRecorderService;
}

export function cameraStatus(
  cameraId: CameraId,
  position: string,
  state: SegmentedRecordingState = 'idle',
  segmentIndex = 0
): CameraStatus {
  return {
    cameraId,
    position,
    device: `/dev/${cameraId}`,
    captureRunning: state !== 'idle',
    deliveredFrames: 0,
    droppedFrames: 0,
    session: {
      cameraId,
      state,
      isRecording: state === 'recording',
      awaitingReconfiguration: state === 'awaiting_reconfiguration',
      segmentIndex,
      currentFilePath: null,
      target: null,
    },
  };
}
