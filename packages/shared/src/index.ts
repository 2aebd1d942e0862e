// Shared engines, constants and ambient utilities

export * from './constants';
export * from './errors';
export { loadEnvConfig } from './config';
export type { EnvConfig } from './config';
export { logger, createLogger } from './logger';

// Data quality: validator/transformer registries and scoring
export * from './quality';

// PII masking and access levels
export * from './masking';
