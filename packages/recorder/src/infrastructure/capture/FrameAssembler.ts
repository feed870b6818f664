import { Transform } from 'stream';
import type { TransformCallback } from 'stream';

/**
 * FrameAssembler - 任意の区切りで届くバイト列を frameSize ごとのフレームに組み直す
 * 出力される chunk は常にちょうど1フレーム
 */
export class FrameAssembler extends Transform {
  private pending: Buffer[] = [];
  private pendingBytes = 0;

  constructor(private readonly frameSize: number) {
    super();
    if (!Number.isInteger(frameSize) || frameSize <= 0) {
      throw new RangeError(`Invalid frame size: ${frameSize}`);
    }
  }

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.pending.push(chunk);
    this.pendingBytes += chunk.length;

    if (this.pendingBytes >= this.frameSize) {
      let buffered = Buffer.concat(this.pending, this.pendingBytes);
      while (buffered.length >= this.frameSize) {
        this.push(buffered.subarray(0, this.frameSize));
        buffered = buffered.subarray(this.frameSize);
      }
      this.pending = buffered.length > 0 ? [buffered] : [];
      this.pendingBytes = buffered.length;
    }
    callback();
  }

  override _flush(callback: TransformCallback): void {
    // 末尾の不完全なフレームは捨てる
    this.pending = [];
    this.pendingBytes = 0;
    callback();
  }
}
