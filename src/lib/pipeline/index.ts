export * from './circuit-breaker';
export * from './decision-cycle';
export * from './live-pipeline';
export * from './market-data';
