import { describe, it, expect, beforeEach } from 'vitest';
import { RecordingSessionEntity } from './RecordingSession.entity.js';
import { InvalidStateTransitionError } from '../errors/DomainErrors.js';
import type { SegmentTarget } from '../recording.js';

const TARGET: SegmentTarget = {
  saveDirectory: '/sd',
  cameraPosition: 'front',
  width: 1280,
  height: 720,
};

describe('RecordingSessionEntity', () => {
  let session: RecordingSessionEntity;

  beforeEach(() => {
    session = RecordingSessionEntity.create('cam0');
  });

  it('should start idle with all fields at their defaults', () => {
    expect(session.toSnapshot()).toEqual({
      cameraId: 'cam0',
      state: 'idle',
      isRecording: false,
      awaitingReconfiguration: false,
      segmentIndex: 0,
      currentFilePath: null,
      target: null,
    });
  });

  describe('prepare', () => {
    it('should move to prepared and store the target', () => {
      session.prepare('/sd/20240101_120000_front.mp4', TARGET);

      expect(session.getState()).toBe('prepared');
      expect(session.getCurrentFilePath()).toBe('/sd/20240101_120000_front.mp4');
      expect(session.getTarget()).toEqual(TARGET);
      expect(session.isRecording()).toBe(false);
    });

    it('should reject prepare when not idle', () => {
      session.prepare('/sd/a_front.mp4', TARGET);

      expect(() => session.prepare('/sd/b_front.mp4', TARGET)).toThrow(InvalidStateTransitionError);
      expect(session.getCurrentFilePath()).toBe('/sd/a_front.mp4');
    });
  });

  describe('startRecording', () => {
    it('should reject start from idle', () => {
      expect(() => session.startRecording()).toThrow(
        "Cannot start recording from state: idle. Must be in 'prepared' or 'awaiting_reconfiguration' state."
      );
    });

    it('should allow start from prepared and from awaiting_reconfiguration', () => {
      session.prepare('/sd/a_front.mp4', TARGET);
      session.startRecording();
      expect(session.isRecording()).toBe(true);

      session.advanceSegment('/sd/b_front.mp4');
      expect(session.isRecording()).toBe(false);
      expect(session.isAwaitingReconfiguration()).toBe(true);

      session.startRecording();
      expect(session.isRecording()).toBe(true);
      expect(session.isAwaitingReconfiguration()).toBe(false);
    });
  });

  describe('advanceSegment', () => {
    it('should increment the index by exactly one per switch', () => {
      session.prepare('/sd/a_front.mp4', TARGET);
      session.startRecording();

      expect(session.advanceSegment('/sd/b_front.mp4')).toBe(1);
      session.startRecording();
      expect(session.advanceSegment('/sd/c_front.mp4')).toBe(2);
      expect(session.getCurrentFilePath()).toBe('/sd/c_front.mp4');
      expect(session.isFirstSegment()).toBe(false);
    });

    it('should reject a switch while awaiting reconfiguration', () => {
      session.prepare('/sd/a_front.mp4', TARGET);
      session.startRecording();
      session.advanceSegment('/sd/b_front.mp4');

      expect(() => session.advanceSegment('/sd/c_front.mp4')).toThrow(InvalidStateTransitionError);
      expect(session.getSegmentIndex()).toBe(1);
    });
  });

  it('should reset every field from any state', () => {
    session.prepare('/sd/a_front.mp4', TARGET);
    session.startRecording();
    session.advanceSegment('/sd/b_front.mp4');

    session.reset();

    expect(session.getState()).toBe('idle');
    expect(session.getSegmentIndex()).toBe(0);
    expect(session.getCurrentFilePath()).toBeNull();
    expect(session.getTarget()).toBeNull();
    expect(session.getCameraId()).toBe('cam0');
  });
});
