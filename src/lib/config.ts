import 'dotenv/config';
import path from 'path';
import { DEFAULT_AUTH_FILE, DEFAULT_LOCALE, DEFAULT_LOG_FILE, DEFAULT_OUTPUT_FILE, ENV_VARS } from './constants';

export interface AppConfig {
  authFile: string;
  outputFile: string;
  logFile: string;
  locale: string;
}

/** Empty values count as unset. */
export function getEnv(key: string): string | undefined {
  const value = process.env[key]?.trim();
  return value ? value : undefined;
}

function resolvePath(key: string, fallback: string, cwd: string): string {
  return path.resolve(cwd, getEnv(key) ?? fallback);
}

export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const resolved: AppConfig = {
    authFile: resolvePath(ENV_VARS.AUTH_FILE, DEFAULT_AUTH_FILE, cwd),
    outputFile: resolvePath(ENV_VARS.OUTPUT_FILE, DEFAULT_OUTPUT_FILE, cwd),
    logFile: resolvePath(ENV_VARS.LOG_FILE, DEFAULT_LOG_FILE, cwd),
    locale: (getEnv(ENV_VARS.LOCALE) ?? DEFAULT_LOCALE).toLowerCase()
  };

  return resolved;
}
