export * from './candle';
export * from './market';
export * from './risk';
export * from './trade';
