import { describe, it, expect } from 'vitest';
import { FrameAssembler } from './FrameAssembler.js';
import { yuv420pFrameSize } from '../../shared/videoFrame.js';
import { flushStreams } from '../../__tests__/fake-process.js';

function collect(assembler: FrameAssembler): string[] {
  const frames: string[] = [];
  assembler.on('data', (frame: Buffer) => frames.push(frame.toString()));
  return frames;
}

describe('FrameAssembler', () => {
  it('should compute the yuv420p frame size', () => {
    expect(yuv420pFrameSize(1280, 720)).toBe(1_382_400);
    expect(yuv420pFrameSize(2, 2)).toBe(6);
  });

  it('should join partial chunks into whole frames', async () => {
    const assembler = new FrameAssembler(4);
    const frames = collect(assembler);

    assembler.write(Buffer.from('ab'));
    assembler.write(Buffer.from('cd'));
    assembler.write(Buffer.from('e'));
    await new Promise<void>((resolve) => assembler.end(resolve));
    await flushStreams();

    expect(frames).toEqual(['abcd']);
  });

  it('should split a large chunk into several frames and keep the remainder', async () => {
    const assembler = new FrameAssembler(3);
    const frames = collect(assembler);

    assembler.write(Buffer.from('abcdefgh'));
    await flushStreams();

    expect(frames).toEqual(['abc', 'def']);

    assembler.write(Buffer.from('i'));
    await flushStreams();
    expect(frames).toEqual(['abc', 'def', 'ghi']);

    assembler.write(Buffer.from('jk'));
    await new Promise<void>((resolve) => assembler.end(resolve));
    await flushStreams();
    expect(frames).toEqual(['abc', 'def', 'ghi']);
  });

  it('should reject a non-positive frame size', () => {
    expect(() => new FrameAssembler(0)).toThrow('Invalid frame size: 0');
  });
});
