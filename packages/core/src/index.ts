export const name = '@evaluator/core';

export * from './config/loader';
export * from './config/credentials';
export * from './config/identity';
export * from './server/client';
export * from './results/extractor';
export * from './publish/publisher';
export * from './evaluator/backoff';
export * from './evaluator/job-pass';
export * from './evaluator/poll-loop';
export * from './evaluator/factory';
