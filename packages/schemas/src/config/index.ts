export * from './DiscoveryEnvironmentSchema.js';
