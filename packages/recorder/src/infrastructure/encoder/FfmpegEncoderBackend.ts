import fs from 'fs/promises';
import path from 'path';
import { PassThrough } from 'stream';
import type { BackendResult, IEncoderBackend } from '../../domain/services/IEncoderBackend.js';
import { BACKEND_OK, backendFailure } from '../../domain/services/IEncoderBackend.js';
import type { ManagedProcess, SpawnProcess } from '../process/managedProcess.js';
import { drainStderr, spawnAndWait, spawnPiped, waitForClose } from '../process/managedProcess.js';
import { describeError } from '../../shared/describeError.js';
import { SURFACE_BUFFER_FRAMES, yuv420pFrameSize } from '../../shared/videoFrame.js';

export interface FfmpegEncoderOptions {
  ffmpegPath: string;
  frameRate: number;
  /** bits/s */
  bitrate: number;
  codec: string;
  /** stop() で ffmpeg の終了を待つ上限 */
  stopTimeoutMs?: number;
  verbose?: boolean;
  spawnProcess?: SpawnProcess;
}

interface PreparedOutput {
  outputPath: string;
  args: string[];
}

const DEFAULT_STOP_TIMEOUT_MS = 5000;

/**
 * FfmpegEncoderBackend - 入力サーフェスに書かれた生フレーム(yuv420p)を
 * ffmpeg の子プロセスで H.264 / MP4 にエンコードする
 *
 * - prepare: 出力ディレクトリ作成、入力サーフェス(PassThrough)を確保
 * - start: ffmpeg を起動してサーフェスを stdin につなぐ
 * - stop: サーフェスを閉じて ffmpeg の終了を待つ
 *
 * 出力は fragmented MP4。途中でプロセスが落ちても再生可能なファイルが残る
 */
export class FfmpegEncoderBackend implements IEncoderBackend {
  private readonly options: FfmpegEncoderOptions;
  private readonly spawnProcess: SpawnProcess;
  private surface: PassThrough | null = null;
  private prepared: PreparedOutput | null = null;
  private process: ManagedProcess | null = null;

  constructor(options: FfmpegEncoderOptions) {
    this.options = options;
    this.spawnProcess = options.spawnProcess ?? spawnPiped;
  }

  async prepare(outputPath: string, width: number, height: number): Promise<BackendResult> {
    if (this.prepared) {
      return backendFailure('Encoder already prepared');
    }
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      return backendFailure(`Invalid video size: ${width}x${height}`);
    }

    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
    } catch (error) {
      return backendFailure(`Cannot create output directory: ${describeError(error)}`);
    }

    this.surface = new PassThrough({
      highWaterMark: yuv420pFrameSize(width, height) * SURFACE_BUFFER_FRAMES,
    });
    this.prepared = { outputPath, args: this.buildArgs(outputPath, width, height) };
    return BACKEND_OK;
  }

  async start(): Promise<BackendResult> {
    const prepared = this.prepared;
    const surface = this.surface;
    if (!prepared || !surface) {
      return backendFailure('Encoder not prepared');
    }
    if (this.process) {
      return backendFailure('Encoder already started');
    }

    let child: ManagedProcess;
    try {
      this.log('Spawning encoder', this.options.ffmpegPath, prepared.args.join(' '));
      child = await spawnAndWait(this.spawnProcess, this.options.ffmpegPath, prepared.args);
    } catch (error) {
      return backendFailure(`Failed to spawn ${this.options.ffmpegPath}: ${describeError(error)}`);
    }

    const stdin = child.stdin;
    if (!stdin) {
      child.kill('SIGKILL');
      return backendFailure('Encoder process has no stdin');
    }

    drainStderr(child, '[ffmpeg]', this.options.verbose ?? false);
    child.stdout?.resume();
    // ffmpeg が先に終了した場合の EPIPE
    stdin.on('error', (err) => this.log('Encoder stdin error', err.message));
    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      this.log('Encoder closed', code, signal ?? '');
      if (this.process === child) {
        this.process = null;
      }
    });
    child.on('error', (err: Error) => this.log('Encoder process error', err.message));

    surface.pipe(stdin);
    this.process = child;
    return BACKEND_OK;
  }

  async stop(): Promise<BackendResult> {
    const child = this.process;
    const surface = this.surface;
    if (!child || !surface) {
      return backendFailure('Encoder not started');
    }

    const timeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    const closed = waitForClose(child, timeoutMs);
    // 入力を閉じると ffmpeg は残りを書き出して終了する
    surface.end();
    const code = await closed;
    this.process = null;

    if (code === null) {
      child.kill('SIGKILL');
      return backendFailure(`Encoder did not exit within ${timeoutMs}ms`);
    }
    if (code !== 0) {
      return backendFailure(`Encoder exited with code ${code}`);
    }
    this.log('Segment finalized', this.prepared?.outputPath ?? '');
    return BACKEND_OK;
  }

  async release(): Promise<void> {
    const child = this.process;
    this.process = null;
    if (child && child.exitCode === null) {
      child.kill('SIGKILL');
    }
    if (this.surface) {
      this.surface.unpipe();
      this.surface.destroy();
      this.surface = null;
    }
    this.prepared = null;
  }

  inputSurfaceHandle(): PassThrough | null {
    return this.surface;
  }

  private buildArgs(outputPath: string, width: number, height: number): string[] {
    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      'rawvideo',
      '-pix_fmt',
      'yuv420p',
      '-s',
      `${width}x${height}`,
      '-r',
      String(this.options.frameRate),
      '-i',
      'pipe:0',
      '-c:v',
      this.options.codec,
      '-b:v',
      String(this.options.bitrate),
      '-pix_fmt',
      'yuv420p',
      '-movflags',
      '+frag_keyframe+empty_moov',
      '-y',
      outputPath,
    ];
  }

  private log(...args: unknown[]): void {
    console.log('🎞️ [FfmpegEncoderBackend]', ...args);
  }
}
