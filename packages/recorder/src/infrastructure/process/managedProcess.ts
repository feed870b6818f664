import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';

/**
 * 録画・キャプチャで扱う子プロセスの最小インターフェース
 * ChildProcess はそのまま満たす。テストではインプロセスのフェイクを差し込む
 */
export interface ManagedProcess extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (command: string, args: string[]) => ManagedProcess;

export const spawnPiped: SpawnProcess = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });

/**
 * プロセスを起動し、spawn / error のどちらかが来るまで待つ
 */
export function spawnAndWait(
  spawnProcess: SpawnProcess,
  command: string,
  args: string[]
): Promise<ManagedProcess> {
  return new Promise<ManagedProcess>((resolve, reject) => {
    const proc = spawnProcess(command, args);
    const onError = (err: Error) => {
      proc.removeListener('spawn', onSpawn);
      reject(err);
    };
    const onSpawn = () => {
      proc.removeListener('error', onError);
      resolve(proc);
    };
    proc.once('error', onError);
    proc.once('spawn', onSpawn);
  });
}

/**
 * close イベント（終了コード）を待つ。timeoutMs 経過で null
 */
export function waitForClose(proc: ManagedProcess, timeoutMs: number): Promise<number | null> {
  return new Promise<number | null>((resolve) => {
    if (proc.exitCode !== null) {
      resolve(proc.exitCode);
      return;
    }
    const timer = setTimeout(() => {
      proc.removeListener('close', onClose);
      resolve(null);
    }, timeoutMs);
    const onClose = (code: number | null) => {
      clearTimeout(timer);
      resolve(code ?? -1);
    };
    proc.once('close', onClose);
  });
}

/**
 * stderr を読み捨てる（パイプが詰まると ffmpeg が止まるため常に読む）
 * verbose のときだけログに流す
 */
export function drainStderr(proc: ManagedProcess, label: string, verbose: boolean): void {
  proc.stderr?.on('data', (data: Buffer) => {
    if (!verbose) {
      return;
    }
    const text = data.toString().trim();
    if (text) {
      console.log(label, text);
    }
  });
}
