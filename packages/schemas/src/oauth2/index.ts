export * from './TokenEndpointResponseSchema.js';
