import { RecorderBusyError } from '@dashcam/common-types';
import type { CameraStatus, RemoteCommandRequest, RemoteCommandResponse } from '@dashcam/common-types';
import type { IRecorderService } from '../services/IRecorderService.js';
import { parseCommand } from '../commands/parseCommand.js';

export const HELP_TEXT = 'Commands: record (录制), stop (停止), status (状态), help (帮助)';

/**
 * チャット経由のリモートコマンド Use Case
 *
 * ビジネスフロー:
 * 1. メッセージをコマンドに変換
 * 2. record: timedRecordingMs の時限録画を開始 / stop: 停止 / status: 状態を返す
 * 3. 結果を返信テキストにする（失敗も返信で伝え、例外にはしない）
 */
export class ExecuteRemoteCommandUseCase {
  private recorder: IRecorderService;
  private timedRecordingMs: number;

  constructor(recorder: IRecorderService, timedRecordingMs: number) {
    this.recorder = recorder;
    this.timedRecordingMs = timedRecordingMs;
  }

  async execute(request: RemoteCommandRequest): Promise<RemoteCommandResponse> {
    const command = parseCommand(request.text);
    console.log(`💬 [RemoteCommand] "${request.text}" -> ${command}`);

    switch (command) {
      case 'record':
        return { command, reply: await this.record() };
      case 'stop':
        return { command, reply: await this.stop() };
      case 'status':
        return { command, reply: this.describeStatus(this.recorder.getStatus()) };
      case 'help':
        return { command, reply: HELP_TEXT };
      case 'unknown':
        return { command, reply: `Unknown command. ${HELP_TEXT}` };
    }
  }

  private async record(): Promise<string> {
    if (this.recorder.isRecording()) {
      return 'Already recording';
    }
    try {
      const started = await this.recorder.startAll({ durationMs: this.timedRecordingMs });
      if (started.length === 0) {
        return 'No camera could be started';
      }
      const seconds = Math.round(this.timedRecordingMs / 1000);
      return `Recording started on ${started.length} camera(s) for ${seconds}s`;
    } catch (error) {
      if (error instanceof RecorderBusyError) {
        return 'Already recording';
      }
      throw error;
    }
  }

  private async stop(): Promise<string> {
    if (!this.recorder.isRecording()) {
      return 'Not recording';
    }
    await this.recorder.stopAll();
    return 'Recording stopped';
  }

  private describeStatus(cameras: CameraStatus[]): string {
    const recording = cameras.filter(
      (camera) => camera.session.isRecording || camera.session.awaitingReconfiguration
    );
    if (recording.length === 0) {
      return `Idle (${cameras.length} camera(s))`;
    }
    const details = recording
      .map((camera) => `${camera.cameraId}(${camera.position}) segment ${camera.session.segmentIndex}`)
      .join(', ');
    return `Recording: ${details}`;
  }
}
