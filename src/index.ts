export * from './lib/types';
export * from './lib/errors';
export * from './lib/config';
export * from './lib/geometry';
export * from './lib/colors';
export * from './lib/image-fetcher';
export * from './lib/checks';
export * from './lib/evaluator';
export * from './lib/task-source';
export * from './lib/report';
export { createLogger } from './lib/logger';
export type { Logger } from './lib/logger';
