export * from './memo.js';
