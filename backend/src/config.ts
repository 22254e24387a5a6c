// Application configuration
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { LogLevel } from './utils/logger.js';

// Load environment variables
dotenv.config({ path: path.join(__dirname, '../.env') });

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// The bundled menu sits beside src/ when run from source and three levels up from dist/backend/src
function defaultMenuDataPath(): string {
  const candidates = [
    path.join(__dirname, '../menu_data/cafe.json'),
    path.join(__dirname, '../../../backend/menu_data/cafe.json')
  ];
  return candidates.find((candidate) => fs.existsSync(candidate)) ?? candidates[0];
}

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.nativeEnum(LogLevel).default(LogLevel.WARN),
  CAFE_NAME: z.string().trim().min(1).default('Cafe'),
  CURRENCY_SYMBOL: z.string().min(1).default('£'),
  STAFF_NAME: z.string().trim().min(1).default('Duty Manager'),
  MENU_DATA_PATH: z.string().trim().min(1).optional()
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  cafeName: string;
  currencySymbol: string;
  staffName: string;
  menuDataPath: string;
}

/**
 * Validate environment variables into the application config
 * @throws {ConfigError} when a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,
    cafeName: vars.CAFE_NAME,
    currencySymbol: vars.CURRENCY_SYMBOL,
    staffName: vars.STAFF_NAME,
    menuDataPath: vars.MENU_DATA_PATH
      ? path.resolve(vars.MENU_DATA_PATH)
      : defaultMenuDataPath()
  };
}
