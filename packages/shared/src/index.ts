export const name = '@evaluator/shared';

export * from './types/events';
export * from './types/job';
export * from './types/result';
export * from './logger';
export * from './redaction';
export * from './errors';
export * from './fs/io';
export * from './config/schema';
