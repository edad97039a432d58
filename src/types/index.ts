export * from './invoice.js';
export * from './purchaseOrder.js';
export * from './output.js';
