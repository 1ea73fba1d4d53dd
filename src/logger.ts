/**
 * wafscope — Logger
 *
 * pino の JSON ログを stderr に出す。stdout は MCP の stdio トランスポートが使うため書き込まない。
 * 各モジュールは `logger.child({ component })` で子ロガーを作る。
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LevelWithSilent {
  return (LEVELS as readonly string[]).includes(value);
}

export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino(
    {
      name: 'wafscope',
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

const envLevel = process.env['WAFSCOPE_LOG_LEVEL']?.trim().toLowerCase() ?? '';

/** Root logger. index.ts re-applies the validated level from config. */
export const logger: Logger = createLogger(isLogLevel(envLevel) ? envLevel : 'info');

export type { Logger };
