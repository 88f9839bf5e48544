export * from './technical-analyzer';
export * from './scorer';
export { sectorFor } from './sectors';
