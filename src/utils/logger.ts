// src/utils/logger.ts: structured logging for the assistant
import { Logger } from 'tslog';

const LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function resolveMinLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  return LEVELS[raw.trim().toLowerCase()] ?? LEVELS.info;
}

export const logger = new Logger({
  name: 'event-assistant',
  minLevel: resolveMinLevel(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
