import type { Request, Response } from 'express';
import { InvalidOperationError } from '@dashcam/common-types';
import type { StartRecordingRequest } from '@dashcam/common-types';
import type { StartRecordingUseCase } from '../../domain/usecases/StartRecording.usecase.js';
import type { StopRecordingUseCase } from '../../domain/usecases/StopRecording.usecase.js';
import { readJsonBody } from '../requestBody.js';

/**
 * Recording Controller
 *
 * 全カメラの録画開始・停止
 */
export class RecordingController {
  private startRecordingUseCase: StartRecordingUseCase;
  private stopRecordingUseCase: StopRecordingUseCase;

  constructor(startRecordingUseCase: StartRecordingUseCase, stopRecordingUseCase: StopRecordingUseCase) {
    this.startRecordingUseCase = startRecordingUseCase;
    this.stopRecordingUseCase = stopRecordingUseCase;
  }

  async start(req: Request, res: Response): Promise<void> {
    const { durationMs } = readJsonBody(req);
    const request: StartRecordingRequest = {};
    if (durationMs !== undefined) {
      if (typeof durationMs !== 'number') {
        throw new InvalidOperationError('durationMs must be a number');
      }
      request.durationMs = durationMs;
    }

    const cameras = await this.startRecordingUseCase.execute(request);
    res.status(201).json({ cameras });
  }

  async stop(_req: Request, res: Response): Promise<void> {
    await this.stopRecordingUseCase.execute();
    res.json({ status: 'stopped' });
  }
}
