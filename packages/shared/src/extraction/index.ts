export * from './types';
export * from './monetary-parser';
export * from './confidence';
export * from './chunk-selector';
export * from './budget-tracker';
export * from './token-estimator';
export * from './prompt';
export * from './regex-fallback';
export * from './llm-strategy';
export * from './orchestrator';
