export * from './engine-config';
