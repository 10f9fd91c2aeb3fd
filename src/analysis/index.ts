/**
 * Comment ratio analysis
 */

export * from './classifier.js';
export * from './file.js';
export * from './aggregator.js';
export * from './scanners/filesystem.js';
export * from './utils/format.js';
