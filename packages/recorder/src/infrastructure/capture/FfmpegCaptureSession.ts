import type { ICaptureSession } from '../../domain/services/ICaptureSession.js';
import type { InputSurface } from '../../domain/services/IEncoderBackend.js';
import type { ManagedProcess, SpawnProcess } from '../process/managedProcess.js';
import { drainStderr, spawnAndWait, spawnPiped, waitForClose } from '../process/managedProcess.js';
import { yuv420pFrameSize } from '../../shared/videoFrame.js';
import { FrameAssembler } from './FrameAssembler.js';

export interface FfmpegCaptureOptions {
  /** 例: /dev/video0 */
  device: string;
  width: number;
  height: number;
  frameRate: number;
  ffmpegPath: string;
  /** ffmpeg の入力フォーマット（既定: v4l2） */
  inputFormat?: string;
  stopTimeoutMs?: number;
  verbose?: boolean;
  spawnProcess?: SpawnProcess;
}

const DEFAULT_STOP_TIMEOUT_MS = 2000;

/**
 * FfmpegCaptureSession - カメラデバイスから生フレームを読み出し、
 * バインドされた入力サーフェスへ1フレームずつ書き込む
 *
 * サーフェス未バインド、閉じたサーフェス、書き込み先が詰まっている間のフレームは捨てて数える
 */
export class FfmpegCaptureSession implements ICaptureSession {
  private readonly options: FfmpegCaptureOptions;
  private readonly spawnProcess: SpawnProcess;
  private process: ManagedProcess | null = null;
  private assembler: FrameAssembler | null = null;
  private surface: InputSurface | null = null;
  private droppedFrames = 0;
  private deliveredFrames = 0;

  constructor(options: FfmpegCaptureOptions) {
    this.options = options;
    this.spawnProcess = options.spawnProcess ?? spawnPiped;
  }

  async start(): Promise<void> {
    if (this.process) {
      return;
    }

    const args = this.buildArgs();
    this.log('Starting capture', this.options.device, args.join(' '));
    const child = await spawnAndWait(this.spawnProcess, this.options.ffmpegPath, args);
    const stdout = child.stdout;
    if (!stdout) {
      child.kill('SIGKILL');
      throw new Error('Capture process has no stdout');
    }

    const assembler = new FrameAssembler(yuv420pFrameSize(this.options.width, this.options.height));
    assembler.on('data', (frame: Buffer) => this.deliver(frame));
    stdout.pipe(assembler);
    drainStderr(child, `[ffmpeg ${this.options.device}]`, this.options.verbose ?? false);

    child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
      this.log('Capture closed', this.options.device, code, signal ?? '');
      if (this.process === child) {
        this.process = null;
        this.detachAssembler();
      }
    });
    child.on('error', (err: Error) => this.log('Capture process error', err.message));

    this.process = child;
    this.assembler = assembler;
  }

  async stop(): Promise<void> {
    const child = this.process;
    if (!child) {
      return;
    }
    this.process = null;

    const timeoutMs = this.options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    const closed = waitForClose(child, timeoutMs);
    child.kill('SIGINT');
    if ((await closed) === null) {
      child.kill('SIGKILL');
    }
    this.detachAssembler();
    this.log('Capture stopped', this.options.device, `dropped frames: ${this.droppedFrames}`);
  }

  isRunning(): boolean {
    return this.process !== null;
  }

  rebindSurface(surface: InputSurface | null): void {
    if (this.surface === surface) {
      return;
    }
    this.surface = surface;
    this.log(surface ? 'Surface bound' : 'Surface unbound', this.options.device);
  }

  getBoundSurface(): InputSurface | null {
    return this.surface;
  }

  getDroppedFrameCount(): number {
    return this.droppedFrames;
  }

  getDeliveredFrameCount(): number {
    return this.deliveredFrames;
  }

  private deliver(frame: Buffer): void {
    const surface = this.surface;
    if (!surface || surface.writableEnded || surface.destroyed || surface.writableNeedDrain) {
      this.droppedFrames += 1;
      return;
    }
    surface.write(frame);
    this.deliveredFrames += 1;
  }

  private detachAssembler(): void {
    const assembler = this.assembler;
    if (!assembler) {
      return;
    }
    this.assembler = null;
    assembler.removeAllListeners('data');
    assembler.destroy();
  }

  private buildArgs(): string[] {
    const { width, height, frameRate, device } = this.options;
    return [
      '-hide_banner',
      '-loglevel',
      'error',
      '-f',
      this.options.inputFormat ?? 'v4l2',
      '-video_size',
      `${width}x${height}`,
      '-framerate',
      String(frameRate),
      '-i',
      device,
      '-f',
      'rawvideo',
      '-pix_fmt',
      'yuv420p',
      'pipe:1',
    ];
  }

  private log(...args: unknown[]): void {
    console.log('📷 [FfmpegCaptureSession]', ...args);
  }
}
