export * from './constants.js';
export * from './load-credentials-file.js';
export * from './default-credentials.js';
