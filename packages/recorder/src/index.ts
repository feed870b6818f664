// Application
export { SegmentedRecordingController } from './application/SegmentedRecordingController.js';
export type { SegmentedRecordingControllerOptions } from './application/SegmentedRecordingController.js';
export { CameraRecordingSession } from './application/CameraRecordingSession.js';
export type { CameraRecordingSessionOptions } from './application/CameraRecordingSession.js';
export { MultiCameraRecorder } from './application/MultiCameraRecorder.js';
export type { MultiCameraRecorderOptions } from './application/MultiCameraRecorder.js';

// Domain
export { BACKEND_OK, backendFailure } from './domain/services/IEncoderBackend.js';
export type {
  BackendResult,
  EncoderBackendFactory,
  IEncoderBackend,
  InputSurface,
} from './domain/services/IEncoderBackend.js';
export type { ICaptureSession } from './domain/services/ICaptureSession.js';
export type { IRecordingEventSink } from './domain/events/IRecordingEventSink.js';
export {
  formatSegmentTimestamp,
  generateSegmentPath,
  parseSegmentFileName,
  parseSegmentTarget,
} from './domain/segment/segmentNaming.js';
export type { ParsedSegmentFileName, ParsedSegmentTarget } from './domain/segment/segmentNaming.js';

// Infrastructure
export { FfmpegEncoderBackend } from './infrastructure/encoder/FfmpegEncoderBackend.js';
export type { FfmpegEncoderOptions } from './infrastructure/encoder/FfmpegEncoderBackend.js';
export { FfmpegCaptureSession } from './infrastructure/capture/FfmpegCaptureSession.js';
export type { FfmpegCaptureOptions } from './infrastructure/capture/FfmpegCaptureSession.js';
export { FrameAssembler } from './infrastructure/capture/FrameAssembler.js';
export { SerialTaskQueue } from './infrastructure/scheduling/SerialTaskQueue.js';
export { RotationTimer } from './infrastructure/scheduling/RotationTimer.js';
export { immediateContext, inlineContext } from './infrastructure/scheduling/ExecutionContext.js';
export type { ExecutionContext } from './infrastructure/scheduling/ExecutionContext.js';
export { getRecorderConfig, parseCameras, readPositiveInt } from './infrastructure/config/recorderConfig.js';
export type { RecorderConfig, VideoConfig } from './infrastructure/config/recorderConfig.js';
export { describeError } from './shared/describeError.js';
