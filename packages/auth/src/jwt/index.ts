export * from './jwt-codec.js';
