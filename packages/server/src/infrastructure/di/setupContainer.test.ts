import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { getRecorderConfig } from '@dashcam/recorder';
import { setupContainer } from './setupContainer.js';

describe('setupContainer', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should create one idle session per configured camera', () => {
    const config = getRecorderConfig({
      CAMERAS: 'cam0:front:/dev/video0,cam1:back:/dev/video2',
      RECORDINGS_DIR: '/sd',
    });

    const container = setupContainer(config);

    expect(container.recorder.isRecording()).toBe(false);
    expect(container.recorder.getStatus().map((camera) => [camera.cameraId, camera.position, camera.device])).toEqual([
      ['cam0', 'front', '/dev/video0'],
      ['cam1', 'back', '/dev/video2'],
    ]);
    expect(container.recorder.getCamera('cam1').captureRunning).toBe(false);
  });
});
