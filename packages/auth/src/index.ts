// Errors
export * from './errors/index.js';

// Signing and JWT
export * from './crypt/index.js';
export * from './jwt/index.js';

// Network clients
export * from './metadata/index.js';
export * from './oauth2/index.js';

// Credentials
export * from './implementations/index.js';

// Discovery
export * from './default/index.js';

// Transport
export * from './transport/index.js';

export { ScopeUtils } from './utils/scope/scope.utils.js';
