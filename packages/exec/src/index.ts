export * from './runner/command';
export * from './runner/compose-runner';
export * from './runner/docker-image';
export * from './sandbox/manifest';
export * from './sandbox/workspace';
