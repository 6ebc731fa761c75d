/**
 * beauty-dashboard - filters, chart series and reports over beauty-synth data
 *
 * @packageDocumentation
 */

export * from './filters.js';
export * from './aggregate.js';
export * from './views.js';
export * from './summary.js';
export * from './report.js';
export * from './commands.js';
