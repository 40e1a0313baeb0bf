export * from './AuthorizedUserInfoSchema.js';
export * from './ServiceAccountInfoSchema.js';
export * from './CredentialTypeSchema.js';
