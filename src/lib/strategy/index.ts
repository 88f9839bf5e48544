export * from './strategy-profiles';
export * from './strategy-matcher';
