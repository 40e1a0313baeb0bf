export * from './base-credentials.js';
export * from './capabilities.js';
export * from './jwt-credentials.js';
export * from './oauth2-credentials.js';
export * from './service-account-credentials.js';
export * from './compute-engine-credentials.js';
