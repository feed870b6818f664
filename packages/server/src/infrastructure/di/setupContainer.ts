import {
  CameraRecordingSession,
  FfmpegCaptureSession,
  FfmpegEncoderBackend,
  MultiCameraRecorder,
} from '@dashcam/recorder';
import type { RecorderConfig } from '@dashcam/recorder';
import { LocalFileSystemSegmentRepository } from '../repositories/LocalFileSystemSegmentRepository.js';

// Use Cases
import { StartRecordingUseCase } from '../../domain/usecases/StartRecording.usecase.js';
import { StopRecordingUseCase } from '../../domain/usecases/StopRecording.usecase.js';
import { GetCamerasUseCase } from '../../domain/usecases/GetCameras.usecase.js';
import { GetCameraUseCase } from '../../domain/usecases/GetCamera.usecase.js';
import { ListSegmentsUseCase } from '../../domain/usecases/ListSegments.usecase.js';
import { ExecuteRemoteCommandUseCase } from '../../domain/usecases/ExecuteRemoteCommand.usecase.js';

// Controllers
import { CameraController } from '../../presentation/controllers/CameraController.js';
import { RecordingController } from '../../presentation/controllers/RecordingController.js';
import { SegmentController } from '../../presentation/controllers/SegmentController.js';
import { CommandController } from '../../presentation/controllers/CommandController.js';

export interface AppContainer {
  recorder: MultiCameraRecorder;
  cameraController: CameraController;
  recordingController: RecordingController;
  segmentController: SegmentController;
  commandController: CommandController;
}

/**
 * カメラごとのキャプチャとエンコーダーを組み立てる
 */
function createCameraSessions(config: RecorderConfig): CameraRecordingSession[] {
  const { video, ffmpegPath, debug } = config;

  return config.cameras.map((camera) => {
    const capture = new FfmpegCaptureSession({
      device: camera.device,
      width: video.width,
      height: video.height,
      frameRate: video.frameRate,
      ffmpegPath,
      verbose: debug,
    });

    return new CameraRecordingSession({
      camera,
      width: video.width,
      height: video.height,
      capture,
      createEncoder: () =>
        new FfmpegEncoderBackend({
          ffmpegPath,
          frameRate: video.frameRate,
          bitrate: video.bitrate,
          codec: video.codec,
          verbose: debug,
        }),
      segmentDurationMs: config.segmentDurationMs,
    });
  });
}

/**
 * 依存関係のセットアップ (Server-side)
 *
 * 録画器・リポジトリ → Use Case → Controller の順に組み立てる
 */
export function setupContainer(config: RecorderConfig): AppContainer {
  const recorder = new MultiCameraRecorder({
    sessions: createCameraSessions(config),
    saveDirectory: config.recordingsDir,
  });
  console.log(
    `📷 Cameras: ${config.cameras.map((camera) => `${camera.cameraId}(${camera.position}) ${camera.device}`).join(', ')}`
  );

  const segmentRepository = new LocalFileSystemSegmentRepository(config.recordingsDir);
  console.log(`📦 Recordings directory: ${config.recordingsDir}`);

  return {
    recorder,
    cameraController: new CameraController(
      new GetCamerasUseCase(recorder),
      new GetCameraUseCase(recorder)
    ),
    recordingController: new RecordingController(
      new StartRecordingUseCase(recorder),
      new StopRecordingUseCase(recorder)
    ),
    segmentController: new SegmentController(new ListSegmentsUseCase(segmentRepository)),
    commandController: new CommandController(
      new ExecuteRemoteCommandUseCase(recorder, config.timedRecordingMs)
    ),
  };
}
