import { z } from 'zod';

import { initLogger, LOG_LEVELS, type LoggerConfig } from './logger.js';
import { ConsoleSink } from './sinks/console.js';

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((val) => val === 'true');

export const loggerEnvSchema = z.object({
  INVARIANT_LOG_COLOR: booleanFlag,
  INVARIANT_LOG_CONSOLE: booleanFlag,
  INVARIANT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

/**
 * Validate logger settings from the environment.
 * @throws Error listing every invalid variable
 */
export function loadLoggerConfig(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${issues}`);
  }

  const { INVARIANT_LOG_COLOR, INVARIANT_LOG_CONSOLE, INVARIANT_LOG_LEVEL } = result.data;

  return {
    level: INVARIANT_LOG_LEVEL,
    sinks: INVARIANT_LOG_CONSOLE ? [new ConsoleSink({ color: INVARIANT_LOG_COLOR })] : [],
  };
}

export function initLoggerFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config = loadLoggerConfig(env);
  initLogger(config);
  return config;
}
