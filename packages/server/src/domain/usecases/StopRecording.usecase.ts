import type { IRecorderService } from '../services/IRecorderService.js';

/**
 * 録画停止 Use Case（録画していなければ何もしない）
 */
export class StopRecordingUseCase {
  private recorder: IRecorderService;

  constructor(recorder: IRecorderService) {
    this.recorder = recorder;
  }

  async execute(): Promise<void> {
    await this.recorder.stopAll();
  }
}
