/**
 * Runtime configuration read from the environment (.env is loaded first)
 */

import 'dotenv/config';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AppConfig {
  port: number;
  allowedOrigins: string[] | '*';
  dbPath: string;
  geminiApiKey: string | undefined;
  geminiModel: string;
  logLevel: LogLevel;
  logSilent: boolean;
}

const parseLogLevel = (value: string | undefined): LogLevel => {
  const level = value?.toLowerCase();
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level;
  }
  return 'info';
};

const parseOrigins = (value: string | undefined): string[] | '*' => {
  const origins = value
    ?.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
  return origins && origins.length > 0 ? origins : '*';
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parseInt(env.PORT ?? '', 10) || 3001,
    allowedOrigins: parseOrigins(env.ALLOWED_ORIGINS),
    dbPath: env.DB_PATH || path.resolve(process.cwd(), 'data', 'menu-planner.db'),
    geminiApiKey: env.GEMINI_API_KEY || undefined,
    geminiModel: env.GEMINI_MODEL || 'gemini-2.5-flash',
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logSilent: env.LOG_SILENT === 'true',
  };
}

export const config: Readonly<AppConfig> = Object.freeze(loadConfig());
