export * from './fee-policy.js';
