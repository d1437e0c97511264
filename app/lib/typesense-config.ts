import { Client } from 'typesense'
import type { AppConfig } from './app-config'

// Server-side Typesense configuration with path support
export function getTypesenseConfig(config: AppConfig) {
  const { host, port, protocol, path, apiKey, connectionTimeoutSeconds } = config.typesense;

  return {
    nodes: [{ host, port, protocol, path }],
    apiKey,
    connectionTimeoutSeconds,
    retryIntervalSeconds: 1,
    healthcheckIntervalSeconds: 2,
    numRetries: 3,
  };
}

export function createTypesenseClient(config: AppConfig): Client {
  return new Client(getTypesenseConfig(config));
}

// Log configuration on startup (without exposing sensitive data)
export function logTypesenseConfig(config: AppConfig) {
  const { host, port, protocol, path, apiKey } = config.typesense;
  console.log('Typesense Configuration:');
  console.log(`  Host: ${host}`);
  console.log(`  Port: ${port}`);
  console.log(`  Protocol: ${protocol}`);
  console.log(`  Path: ${path || '(none)'}`);
  console.log(`  Collection: ${config.collectionName}`);
  console.log(`  Vector size: ${config.vectorSize}`);
  console.log(`  API Key: ${apiKey ? '***' + apiKey.slice(-4) : 'NOT SET'}`);
}
