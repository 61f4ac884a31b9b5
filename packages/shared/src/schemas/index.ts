export * from './bar.schema.js';
export * from './order.schema.js';
