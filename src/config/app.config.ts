import { LogLevel } from '@nestjs/common';

export interface AppConfig {
  port: number;
  logLevels: LogLevel[];
  irrDefaultGuess: number;
}

const KNOWN_LOG_LEVELS: readonly LogLevel[] = ['log', 'error', 'warn', 'debug', 'verbose', 'fatal'];

function isLogLevel(value: string): value is LogLevel {
  return KNOWN_LOG_LEVELS.some((level) => level === value);
}

function parseNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function parseLogLevels(raw: string | undefined): LogLevel[] {
  const levels = (raw ?? '')
    .split(',')
    .map((level) => level.trim())
    .filter(isLogLevel);
  return levels.length > 0 ? levels : ['log', 'warn', 'error'];
}

/** Reads settings from the environment; unset or invalid values take defaults */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return Object.freeze({
    port: parseNumber(env.PORT, 3000),
    logLevels: parseLogLevels(env.LOG_LEVELS),
    irrDefaultGuess: parseNumber(env.IRR_DEFAULT_GUESS, 0.1),
  });
}

export const APP_CONFIG = 'APP_CONFIG';
