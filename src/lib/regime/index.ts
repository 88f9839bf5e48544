export * from './regime-classifier';
