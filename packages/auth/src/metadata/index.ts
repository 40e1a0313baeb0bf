export * as MetadataClient from './metadata-client.js';
export type { MetadataOptions, PingOptions, ServiceAccountToken } from './metadata-client.js';
