export * from './request.js';
export * from './fetch-request.js';
export * from './errors/transport-error.js';
