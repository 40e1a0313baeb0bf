export * from './constants.js';
export * from './token-endpoint-client.js';
