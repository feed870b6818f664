import type { CameraStatus } from '@dashcam/common-types';
import type { IRecorderService } from '../services/IRecorderService.js';

export class GetCamerasUseCase {
  private recorder: IRecorderService;

  constructor(recorder: IRecorderService) {
    this.recorder = recorder;
  }

  async execute(): Promise<CameraStatus[]> {
    return this.recorder.getStatus();
  }
}
