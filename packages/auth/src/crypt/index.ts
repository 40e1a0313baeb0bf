export * from './signer.js';
export * from './verify-signature.js';
