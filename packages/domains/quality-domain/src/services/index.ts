export * from './contact-classifier.js';
export * from './creation-date.js';
export * from './quality-scorer.js';
export * from './record-filter.js';
export * from './record-aggregator.js';
export * from './record-drilldown.js';
export * from './record-assembly.js';
export * from './row-importer.js';
