import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';

export type PipelineLogger = Logger;

export const createLoggerOptions = (level: string): LoggerOptions => ({
  name: 'engagement-pipeline',
  level,
  base: undefined,
  timestamp: stdTimeFunctions.isoTime
});

export function createLogger(level: string): PipelineLogger {
  return pino(createLoggerOptions(level));
}

export function createSilentLogger(): PipelineLogger {
  return pino({ level: 'silent' });
}
