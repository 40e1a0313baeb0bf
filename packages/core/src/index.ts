export * from './validation-utils.js';
export * from './transports/index.js';

export * as RequestUtils from './utils/RequestUtils.js';

// Logging with redaction
export * from './logging/index.js';
