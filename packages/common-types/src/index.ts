// Entities
export { RecordingSessionEntity } from './entities/RecordingSession.entity.js';

// Domain Errors
export {
  DomainError,
  InvalidStateTransitionError,
  InvalidOperationError,
  EncoderPrepareError,
  EncoderStartError,
  SegmentRotationError,
  CameraNotFoundError,
  RecorderBusyError,
  ConfigurationError,
} from './errors/DomainErrors.js';

// Camera types
export { UNKNOWN_CAMERA_POSITION } from './camera.js';
export type { CameraId, CameraPosition, CameraDescriptor, CameraStatus } from './camera.js';

// Recording types
export { SEGMENT_DURATION_MS } from './recording.js';
export type {
  SegmentedRecordingState,
  SegmentTarget,
  RecordingSessionSnapshot,
  SegmentFile,
} from './recording.js';

// Command / API types
export type {
  RemoteCommandType,
  RemoteCommandRequest,
  RemoteCommandResponse,
  StartRecordingRequest,
  StartedCamera,
} from './command.js';

// WebSocket message types
export type {
  RecordStarted,
  SegmentSwitched,
  RecordStopped,
  RecordFailed,
  RecorderServerToClientEvents,
} from './websocket.js';
