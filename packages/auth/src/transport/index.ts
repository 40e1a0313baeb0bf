export * from './authorized-http.js';
