/**
 * DICOM IO harness execution engine
 *
 * The workload execution contract, an in-process runner, and the search and
 * upload work units the scenarios submit.
 *
 * @module @dicom-it/engine
 */

export * from './executor/index.js';
export * from './units/search-unit.js';
export * from './units/upload-unit.js';
