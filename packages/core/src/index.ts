// Logging
export * from './logging/index.js';

export { formatValue } from './format.js';
