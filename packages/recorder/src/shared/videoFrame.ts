/**
 * yuv420p 1フレームのバイト数
 */
export function yuv420pFrameSize(width: number, height: number): number {
  return (width * height * 3) / 2;
}

/**
 * 入力サーフェスに溜めておけるフレーム数（超えた分はキャプチャ側で捨てる）
 */
export const SURFACE_BUFFER_FRAMES = 8;
