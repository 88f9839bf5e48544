export * from './backtester';
