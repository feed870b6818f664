import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { CameraNotFoundError, InvalidOperationError, RecorderBusyError } from '@dashcam/common-types';
import { MultiCameraRecorder } from './MultiCameraRecorder.js';
import { CameraRecordingSession } from './CameraRecordingSession.js';
import { inlineContext } from '../infrastructure/scheduling/ExecutionContext.js';
import {
  FakeCaptureSession,
  createEncoderFactory,
  createRecordingSink,
} from '../__tests__/test-helpers.js';
import type { EncoderFailurePlan } from '../__tests__/test-helpers.js';

function createCamera(cameraId: string, position: string, captureError?: string) {
  const { encoders, createEncoder } = createEncoderFactory();
  const capture = new FakeCaptureSession(captureError);
  const session = new CameraRecordingSession({
    camera: { cameraId, position, device: `/dev/${cameraId}` },
    width: 1280,
    height: 720,
    capture,
    createEncoder,
    eventContext: inlineContext,
  });
  return { session, capture, encoders };
}

function setup(options: { backCaptureError?: string } = {}) {
  const front = createCamera('cam0', 'front');
  const back = createCamera('cam1', 'back', options.backCaptureError);
  const recorder = new MultiCameraRecorder({
    sessions: [front.session, back.session],
    saveDirectory: '/sd',
  });
  const { events, sink } = createRecordingSink();
  recorder.addObserver(sink);

  const settle = async () => {
    await front.session.whenIdle();
    await back.session.whenIdle();
  };
  return { recorder, front, back, events, settle };
}

describe('MultiCameraRecorder', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(new Date(2024, 0, 1, 12, 0, 0));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('startAll', () => {
    it('should start every camera with one shared timestamp', async () => {
      const { recorder, front, back, events } = setup();

      const started = await recorder.startAll();

      expect(started).toEqual([
        { cameraId: 'cam0', filePath: '/sd/20240101_120000_front.mp4' },
        { cameraId: 'cam1', filePath: '/sd/20240101_120000_back.mp4' },
      ]);
      expect(front.encoders[0].outputPath).toBe('/sd/20240101_120000_front.mp4');
      expect(back.encoders[0].outputPath).toBe('/sd/20240101_120000_back.mp4');
      expect(recorder.isRecording()).toBe(true);
      expect(recorder.hasTimedStop()).toBe(false);
      expect(events).toEqual(['start:cam0', 'start:cam1']);
    });

    it('should reject a second start while recording', async () => {
      const { recorder, front } = setup();
      await recorder.startAll();

      await expect(recorder.startAll()).rejects.toBeInstanceOf(RecorderBusyError);
      expect(front.encoders).toHaveLength(1);
    });

    it('should reject a start issued while another start is in progress', async () => {
      const { recorder } = setup();

      const first = recorder.startAll();
      await expect(recorder.startAll()).rejects.toThrow('Recording is already in progress');
      expect(await first).toHaveLength(2);
    });

    it('should reject an invalid duration', async () => {
      const { recorder, front } = setup();

      await expect(recorder.startAll({ durationMs: 0 })).rejects.toBeInstanceOf(InvalidOperationError);
      await expect(recorder.startAll({ durationMs: 1.5 })).rejects.toThrow(
        'durationMs must be a positive integer: 1.5'
      );
      expect(front.encoders).toHaveLength(0);
    });

    it('should leave out cameras that fail to start', async () => {
      const { recorder, back, events } = setup({ backCaptureError: 'no such device' });

      const started = await recorder.startAll();

      expect(started).toEqual([{ cameraId: 'cam0', filePath: '/sd/20240101_120000_front.mp4' }]);
      expect(back.session.isActive()).toBe(false);
      expect(events).toEqual(['start:cam0', 'error:cam1:Failed to start capture: no such device']);
    });

    it('should not let an earlier timed stop end a later manual recording', async () => {
      const plans: EncoderFailurePlan[] = [{}, { prepare: 'disk full' }];
      const { encoders, createEncoder } = createEncoderFactory(plans);
      const session = new CameraRecordingSession({
        camera: { cameraId: 'cam0', position: 'front', device: '/dev/cam0' },
        width: 1280,
        height: 720,
        capture: new FakeCaptureSession(),
        createEncoder,
        segmentDurationMs: 10_000,
        eventContext: inlineContext,
      });
      const recorder = new MultiCameraRecorder({ sessions: [session], saveDirectory: '/sd' });
      const { events, sink } = createRecordingSink();
      recorder.addObserver(sink);

      await recorder.startAll({ durationMs: 30_000 });
      await vi.advanceTimersByTimeAsync(10_000);
      await session.whenIdle();
      expect(session.isActive()).toBe(false);
      expect(encoders[1].calls).toEqual(['prepare', 'release']);

      await recorder.startAll({});
      expect(recorder.hasTimedStop()).toBe(false);

      await vi.advanceTimersByTimeAsync(25_000);
      await session.whenIdle();

      expect(recorder.isRecording()).toBe(true);
      expect(events.slice(0, 3)).toEqual([
        'start:cam0',
        'error:cam0:Failed to switch segment: disk full',
        'start:cam0',
      ]);
      expect(events).not.toContain('stop:cam0');
    });

    it('should stop every camera once the duration elapses', async () => {
      const { recorder, events, settle } = setup();
      await recorder.startAll({ durationMs: 30_000 });
      expect(recorder.hasTimedStop()).toBe(true);

      await vi.advanceTimersByTimeAsync(30_000);
      await settle();

      expect(recorder.isRecording()).toBe(false);
      expect(recorder.hasTimedStop()).toBe(false);
      expect(events).toEqual(['start:cam0', 'start:cam1', 'stop:cam0', 'stop:cam1']);
    });
  });

  describe('stopAll', () => {
    it('should stop every camera and cancel the timed stop', async () => {
      const { recorder, front, events } = setup();
      await recorder.startAll({ durationMs: 30_000 });

      await recorder.stopAll();

      expect(recorder.hasTimedStop()).toBe(false);
      expect(recorder.isRecording()).toBe(false);
      expect(front.capture.getBoundSurface()).toBeNull();
      expect(events).toEqual(['start:cam0', 'start:cam1', 'stop:cam0', 'stop:cam1']);

      await vi.advanceTimersByTimeAsync(30_000);
      expect(events).toHaveLength(4);
    });

    it('should allow a new recording after stopping', async () => {
      const { recorder } = setup();
      await recorder.startAll();
      await recorder.stopAll();

      vi.setSystemTime(new Date(2024, 0, 1, 12, 5, 0));
      const started = await recorder.startAll();

      expect(started.map((camera) => camera.filePath)).toEqual([
        '/sd/20240101_120500_front.mp4',
        '/sd/20240101_120500_back.mp4',
      ]);
    });
  });

  describe('getCamera', () => {
    it('should return the status of a known camera', () => {
      const { recorder } = setup();

      const status = recorder.getCamera('cam1');

      expect(status.cameraId).toBe('cam1');
      expect(status.position).toBe('back');
      expect(status.device).toBe('/dev/cam1');
      expect(status.session.state).toBe('idle');
    });

    it('should throw CameraNotFoundError for an unknown camera', () => {
      const { recorder } = setup();

      expect(() => recorder.getCamera('cam9')).toThrow(CameraNotFoundError);
      expect(() => recorder.getCamera('cam9')).toThrow('Camera not found: cam9');
    });
  });

  it('should list every camera in the status', async () => {
    const { recorder } = setup();
    await recorder.startAll();

    expect(recorder.getStatus().map((status) => [status.cameraId, status.session.state])).toEqual([
      ['cam0', 'recording'],
      ['cam1', 'recording'],
    ]);
  });

  it('should dispose every session on shutdown', async () => {
    const { recorder, front, back, events } = setup();
    await recorder.startAll({ durationMs: 30_000 });

    await recorder.shutdown();

    expect(recorder.hasTimedStop()).toBe(false);
    expect(front.capture.isRunning()).toBe(false);
    expect(back.capture.isRunning()).toBe(false);
    expect(events).toEqual(['start:cam0', 'start:cam1', 'stop:cam0', 'stop:cam1']);
  });
});
