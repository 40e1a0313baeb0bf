export * from './credentials/index.js';
export * from './oauth2/index.js';
export * from './metadata/index.js';
export * from './config/index.js';
