export * from './logger.port';
export * from './process-runner.port';
