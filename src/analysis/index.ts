export * from './analysis-engine';
export * from './extraction';
export * from './prompt';
export * from './providers';
