export * from './timebounds.js';
