export * from './risk-profiler';
export * from './behavior-profile';
