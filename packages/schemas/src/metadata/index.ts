export * from './MetadataTokenResponseSchema.js';
