import type { Request, Response } from 'express';
import { InvalidOperationError } from '@dashcam/common-types';
import type { ExecuteRemoteCommandUseCase } from '../../domain/usecases/ExecuteRemoteCommand.usecase.js';
import { readJsonBody } from '../requestBody.js';

/**
 * Command Controller
 *
 * チャットボットなどから届いたメッセージをコマンドとして実行し、返信テキストを返す
 */
export class CommandController {
  private executeRemoteCommandUseCase: ExecuteRemoteCommandUseCase;

  constructor(executeRemoteCommandUseCase: ExecuteRemoteCommandUseCase) {
    this.executeRemoteCommandUseCase = executeRemoteCommandUseCase;
  }

  async execute(req: Request, res: Response): Promise<void> {
    const { text } = readJsonBody(req);
    if (typeof text !== 'string' || text.trim() === '') {
      throw new InvalidOperationError('text is required');
    }

    const response = await this.executeRemoteCommandUseCase.execute({ text });
    res.json(response);
  }
}
