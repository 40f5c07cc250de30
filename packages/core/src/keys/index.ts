export * from './strkey.js';
export * from './keypair.js';
