import type { RemoteCommandType } from '@dashcam/common-types';

/**
 * コマンドと別名（英語 / 中国語）
 */
const COMMAND_ALIASES: ReadonlyArray<readonly [RemoteCommandType, readonly string[]]> = [
  ['record', ['record', '录制']],
  ['stop', ['stop', '停止']],
  ['status', ['status', '状态']],
  ['help', ['help', '帮助']],
];

const MENTION_PATTERN = /@\S+/g;

/**
 * チャットのメッセージをコマンドに変換する
 *
 * "@dashcam record" のようなメンションは取り除き、前後の空白と大文字小文字を無視する
 */
export function parseCommand(text: string): RemoteCommandType {
  const normalized = text.replace(MENTION_PATTERN, ' ').trim().toLowerCase();
  const match = COMMAND_ALIASES.find(([, aliases]) => aliases.includes(normalized));
  return match ? match[0] : 'unknown';
}
