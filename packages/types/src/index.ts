/**
 * @provision/types - Type definitions for the provision reconciliation engine
 */

// Logging
export * from './logging.js';

// Command boundary
export * from './commands.js';

// Resource model (descriptors, probes, appliers)
export * from './resources.js';

// Reconciliation outcomes
export * from './outcomes.js';

// Configuration entries
export * from './config.js';
