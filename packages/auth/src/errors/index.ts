export * from './authentication-error.js';
export * from './credential-errors.js';
