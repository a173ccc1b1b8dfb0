/**
 * Core Module Exports
 */

export * from './context-factory';
export * from './errors';
export * from './human-behavior';
export * from './navigation-service';
export * from './pagination-engine';
export * from './proxy-manager';
export * from './rate-window';
export * from './result-extractor';
export * from './search-attempt';
export * from './search-coordinator';
export * from './search-dependencies';
export * from './search-service';
export * from './session-pool';
export * from './stealth-script';
export { type Env, parseEnv } from './env';
