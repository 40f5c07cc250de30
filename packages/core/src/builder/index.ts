export * from './builder.js';
export * from './built-transaction.js';
export * from './stages.js';
