import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { FfmpegEncoderBackend } from './FfmpegEncoderBackend.js';
import type { FfmpegEncoderOptions } from './FfmpegEncoderBackend.js';
import { createFakeSpawn, flushStreams } from '../../__tests__/fake-process.js';
import type { FakeProcessBehavior } from '../../__tests__/fake-process.js';

describe('FfmpegEncoderBackend', () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), 'encoder-test-'));
  });

  afterEach(async () => {
    await fs.rm(baseDir, { recursive: true, force: true });
  });

  function createEncoder(behavior: FakeProcessBehavior = {}, overrides: Partial<FfmpegEncoderOptions> = {}) {
    const fake = createFakeSpawn(behavior);
    const encoder = new FfmpegEncoderBackend({
      ffmpegPath: 'ffmpeg',
      frameRate: 30,
      bitrate: 1_000_000,
      codec: 'libx264',
      spawnProcess: fake.spawnProcess,
      ...overrides,
    });
    return { encoder, spawned: fake.spawned };
  }

  describe('prepare', () => {
    it('should create the output directory and a fresh input surface', async () => {
      const { encoder, spawned } = createEncoder();
      const outputPath = path.join(baseDir, 'sd', '20240101_120000_front.mp4');

      expect(await encoder.prepare(outputPath, 1280, 720)).toEqual({ ok: true });

      const stats = await fs.stat(path.join(baseDir, 'sd'));
      expect(stats.isDirectory()).toBe(true);
      expect(encoder.inputSurfaceHandle()).not.toBeNull();
      expect(spawned).toHaveLength(0);
    });

    it('should reject an invalid video size', async () => {
      const { encoder } = createEncoder();

      expect(await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 0, 720)).toEqual({
        ok: false,
        error: 'Invalid video size: 0x720',
      });
      expect(encoder.inputSurfaceHandle()).toBeNull();
    });

    it('should reject a second prepare', async () => {
      const { encoder } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);

      expect(await encoder.prepare(path.join(baseDir, 'b_front.mp4'), 640, 480)).toEqual({
        ok: false,
        error: 'Encoder already prepared',
      });
    });
  });

  describe('start', () => {
    it('should fail when not prepared', async () => {
      const { encoder } = createEncoder();

      expect(await encoder.start()).toEqual({ ok: false, error: 'Encoder not prepared' });
    });

    it('should spawn ffmpeg reading raw frames from stdin', async () => {
      const { encoder, spawned } = createEncoder();
      const outputPath = path.join(baseDir, '20240101_120000_front.mp4');
      await encoder.prepare(outputPath, 1280, 720);

      expect(await encoder.start()).toEqual({ ok: true });

      expect(spawned).toHaveLength(1);
      expect(spawned[0].command).toBe('ffmpeg');
      expect(spawned[0].args).toEqual([
        '-hide_banner',
        '-loglevel',
        'error',
        '-f',
        'rawvideo',
        '-pix_fmt',
        'yuv420p',
        '-s',
        '1280x720',
        '-r',
        '30',
        '-i',
        'pipe:0',
        '-c:v',
        'libx264',
        '-b:v',
        '1000000',
        '-pix_fmt',
        'yuv420p',
        '-movflags',
        '+frag_keyframe+empty_moov',
        '-y',
        outputPath,
      ]);
    });

    it('should forward frames written to the surface into ffmpeg', async () => {
      const { encoder, spawned } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 2, 2);
      await encoder.start();

      encoder.inputSurfaceHandle()?.write(Buffer.from('frame-1'));
      await flushStreams();

      expect(spawned[0].process.receivedText()).toBe('frame-1');
    });

    it('should report a spawn failure', async () => {
      const { encoder } = createEncoder({ spawnError: 'spawn ffmpeg ENOENT' });
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);

      expect(await encoder.start()).toEqual({
        ok: false,
        error: 'Failed to spawn ffmpeg: spawn ffmpeg ENOENT',
      });
    });

    it('should reject a second start', async () => {
      const { encoder } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();

      expect(await encoder.start()).toEqual({ ok: false, error: 'Encoder already started' });
    });
  });

  describe('stop', () => {
    it('should fail when not started', async () => {
      const { encoder } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);

      expect(await encoder.stop()).toEqual({ ok: false, error: 'Encoder not started' });
    });

    it('should close the input and succeed when ffmpeg exits cleanly', async () => {
      const { encoder, spawned } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();

      expect(await encoder.stop()).toEqual({ ok: true });
      expect(spawned[0].process.exitCode).toBe(0);
      expect(spawned[0].process.signals).toEqual([]);
    });

    it('should report a non-zero exit code', async () => {
      const { encoder } = createEncoder({ exitOnStdinEnd: 1 });
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();

      expect(await encoder.stop()).toEqual({ ok: false, error: 'Encoder exited with code 1' });
    });

    it('should kill ffmpeg when it does not exit in time', async () => {
      const { encoder, spawned } = createEncoder({ exitOnStdinEnd: 'hang' }, { stopTimeoutMs: 20 });
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();

      expect(await encoder.stop()).toEqual({ ok: false, error: 'Encoder did not exit within 20ms' });
      expect(spawned[0].process.signals).toEqual(['SIGKILL']);
    });
  });

  describe('release', () => {
    it('should kill a running process and drop the surface', async () => {
      const { encoder, spawned } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();

      await encoder.release();
      await encoder.release();

      expect(spawned[0].process.signals).toEqual(['SIGKILL']);
      expect(encoder.inputSurfaceHandle()).toBeNull();
    });

    it('should not signal a process that already exited', async () => {
      const { encoder, spawned } = createEncoder();
      await encoder.prepare(path.join(baseDir, 'a_front.mp4'), 640, 480);
      await encoder.start();
      await encoder.stop();

      await encoder.release();

      expect(spawned[0].process.signals).toEqual([]);
    });
  });
});
