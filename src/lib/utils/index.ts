export * from './math';
export * from './dates';
export * from './logger';
