/**
 * Engine exports: job state machine, orchestration and the concurrency,
 * deadline and retry primitives it runs on.
 */

export * from './state-machine';
export * from './concurrency';
export * from './deadline';
export * from './retry';
export * from './orchestrator';
