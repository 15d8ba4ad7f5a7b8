import pino from 'pino';

// Level is raised/lowered from config once the app starts, see configureLogger.
export const logger = pino({
  name: 'reservoir-gate-flows',
  level: 'info',
  timestamp: pino.stdTimeFunctions.isoTime
});


export function configureLogger(options: {level: string}): void {
  logger.level = options.level;
}
