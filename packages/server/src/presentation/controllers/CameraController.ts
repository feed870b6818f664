import type { Request, Response } from 'express';
import type { GetCamerasUseCase } from '../../domain/usecases/GetCameras.usecase.js';
import type { GetCameraUseCase } from '../../domain/usecases/GetCamera.usecase.js';

/**
 * Camera Controller
 *
 * HTTPリクエストを受け取り、Use Caseを実行し、レスポンスを返す
 * エラーハンドリングはミドルウェアに委譲
 */
export class CameraController {
  private getCamerasUseCase: GetCamerasUseCase;
  private getCameraUseCase: GetCameraUseCase;

  constructor(getCamerasUseCase: GetCamerasUseCase, getCameraUseCase: GetCameraUseCase) {
    this.getCamerasUseCase = getCamerasUseCase;
    this.getCameraUseCase = getCameraUseCase;
  }

  async list(_req: Request, res: Response): Promise<void> {
    const cameras = await this.getCamerasUseCase.execute();
    res.json({ cameras });
  }

  async getById(req: Request, res: Response): Promise<void> {
    const { id } = req.params;
    const camera = await this.getCameraUseCase.execute({ cameraId: id });
    res.json(camera);
  }
}
