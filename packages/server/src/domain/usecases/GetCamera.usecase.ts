import type { CameraId, CameraStatus } from '@dashcam/common-types';
import type { IRecorderService } from '../services/IRecorderService.js';

export interface GetCameraRequest {
  cameraId: CameraId;
}

/**
 * カメラ単体の状態取得 Use Case
 * 存在しない場合は CameraNotFoundError（404）
 */
export class GetCameraUseCase {
  private recorder: IRecorderService;

  constructor(recorder: IRecorderService) {
    this.recorder = recorder;
  }

  async execute(request: GetCameraRequest): Promise<CameraStatus> {
    return this.recorder.getCamera(request.cameraId);
  }
}
