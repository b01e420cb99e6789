/**
 * DICOM IO harness core
 *
 * Data model, volatile-tag normalization, the comparison protocol, resource
 * naming, scenario state machine, errors, logging and configuration.
 *
 * @module @dicom-it/core
 */

export * from './types.js';
export * from './errors/index.js';
export * from './logging/logger.js';
export * from './config/harness-config.js';
export * from './normalize/normalizer.js';
export * from './compare/compare.js';
export * from './naming/resource-id.js';
export * from './scenario/state-machine.js';
