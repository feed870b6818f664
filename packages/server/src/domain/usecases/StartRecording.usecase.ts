import type { StartRecordingRequest, StartedCamera } from '@dashcam/common-types';
import type { IRecorderService } from '../services/IRecorderService.js';

/**
 * 録画開始 Use Case
 *
 * 全カメラを同じタイムスタンプで開始する
 * 録画中の場合は RecorderBusyError（409）
 */
export class StartRecordingUseCase {
  private recorder: IRecorderService;

  constructor(recorder: IRecorderService) {
    this.recorder = recorder;
  }

  async execute(request: StartRecordingRequest = {}): Promise<StartedCamera[]> {
    return this.recorder.startAll(request);
  }
}
