/**
 * Paper Trading Module
 * Simulated positions, their lifecycle, performance and persistence
 */

// Types
export * from './types';

// Lifecycle
export * from './paper-trader';
export * from './performance-monitor';
export * from './portfolio-analytics';

// Repository
export * from './repository';
export { createRepository } from './create-repository';
