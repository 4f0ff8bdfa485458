export * from './errors.js';
export * from './specification.js';
export * from './graph.js';
export * from './trace.js';
export * from './agent.js';
export * from './coordination.js';
export * from './evaluation.js';
export * from './events.js';
