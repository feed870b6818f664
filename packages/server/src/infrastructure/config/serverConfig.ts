import { ConfigurationError } from '@dashcam/common-types';
import { readPositiveInt } from '@dashcam/recorder';

export type LogLevel = 'debug' | 'info';

export interface ServerConfig {
  port: number;
  corsOrigin: string;
  logLevel: LogLevel;
}

/**
 * 環境変数からHTTPサーバー設定を取得
 *
 * LOG_LEVEL=debug で morgan の出力を dev 形式にする
 */
export function getServerConfig(env: Record<string, string | undefined> = process.env): ServerConfig {
  const port = readPositiveInt(env, 'PORT', 3000);
  if (port > 65535) {
    throw new ConfigurationError(`PORT must be between 1 and 65535: ${port}`);
  }

  return {
    port,
    corsOrigin: env.CORS_ORIGIN || '*',
    logLevel: env.LOG_LEVEL === 'debug' ? 'debug' : 'info',
  };
}
