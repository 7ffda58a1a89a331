#!/usr/bin/env node
import { resolve } from 'path';
import type { Protocol } from '../../src';

interface Args {
  useTls: boolean;
  host: string;
  port: number;
  protocol: Protocol;
  caPath: string;
  certPath: string;
  keyPath: string;
}

/**
 * Parse command line arguments for examples.
 * @returns Parsed arguments
 */
export function parseArgs(): Args {
  // Check for TLS and protocol flags
  const useTls = process.argv.includes('--tls');
  const protocol: Protocol = process.argv.includes('--http') ? 'http' : 'grpc';

  // Parse host and port from environment variables or defaults
  const host = process.env.REMOTE_MODEL_HOST || '127.0.0.1';
  const port = parseInt(process.env.REMOTE_MODEL_PORT || (protocol === 'http' ? '8080' : '8085'), 10);

  // Default cert/key paths
  const defaultCertDir = resolve(process.cwd(), 'certs');

  // Parse cert/key paths from environment variables or defaults
  const caPath = process.env.REMOTE_MODEL_CA_PATH || resolve(defaultCertDir, 'ca.crt');
  const certPath = process.env.REMOTE_MODEL_CERT_PATH || resolve(defaultCertDir, 'client.crt');
  const keyPath = process.env.REMOTE_MODEL_KEY_PATH || resolve(defaultCertDir, 'client.key');

  return {
    useTls,
    host,
    port,
    protocol,
    caPath,
    certPath,
    keyPath
  };
}
