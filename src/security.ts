import { credentials, type ChannelCredentials } from '@grpc/grpc-js';
import Debug from 'debug';
import { createSecureContext } from 'tls';
import type { Protocol, RemoteTlsConfig } from './config';
import { ConfigurationError } from './errors';
import type { CertificateLoader } from './settings';

const debug = Debug('remote-model:security');

export type SecurityMode = 'insecure' | 'tls' | 'mtls';

/**
 * TLS options handed to the HTTP agent.
 */
export interface HttpTlsOptions {
  ca?: Buffer;
  cert?: Buffer;
  key?: Buffer;
  rejectUnauthorized: boolean;
}

export interface GrpcCredentials {
  protocol: 'grpc';
  mode: SecurityMode;
  channelCredentials: ChannelCredentials;
}

export interface HttpCredentials {
  protocol: 'http';
  mode: SecurityMode;
  scheme: 'http' | 'https';
  tls?: HttpTlsOptions;
}

/**
 * Protocol-specific credentials produced once per remote model.
 */
export type ResolvedCredentials = GrpcCredentials | HttpCredentials;

/**
 * Turns a TLS block into credentials for the given protocol.
 *
 * gRPC has no way to encrypt without verifying the server, so
 * `insecureVerify` is rejected for it here rather than on the first call.
 * @throws ConfigurationError for invalid combinations or unreadable files.
 */
export function resolveTransportSecurity(
  tls: RemoteTlsConfig | undefined,
  protocol: 'grpc',
  loader: CertificateLoader
): GrpcCredentials;
export function resolveTransportSecurity(
  tls: RemoteTlsConfig | undefined,
  protocol: 'http',
  loader: CertificateLoader
): HttpCredentials;
export function resolveTransportSecurity(
  tls: RemoteTlsConfig | undefined,
  protocol: Protocol,
  loader: CertificateLoader
): ResolvedCredentials;
export function resolveTransportSecurity(
  tls: RemoteTlsConfig | undefined,
  protocol: Protocol,
  loader: CertificateLoader
): ResolvedCredentials {
  if (!tls || !tls.enabled) {
    debug('TLS disabled, using plaintext %s', protocol);
    return protocol === 'grpc'
      ? { protocol, mode: 'insecure', channelCredentials: credentials.createInsecure() }
      : { protocol, mode: 'insecure', scheme: 'http' };
  }

  const mutual = isMutual(tls);
  if (protocol === 'grpc' && tls.insecureVerify) {
    throw new ConfigurationError(
      'insecureVerify is not supported for gRPC connections; provide a CA file or disable TLS'
    );
  }

  const ca = tls.caFile ? load(loader, tls.caFile, 'CA certificate') : undefined;
  const cert = mutual && tls.certFile ? load(loader, tls.certFile, 'client certificate') : undefined;
  const key = mutual && tls.keyFile ? load(loader, tls.keyFile, 'client key') : undefined;
  const mode: SecurityMode = mutual ? 'mtls' : 'tls';
  debug('Resolved %s credentials for %s (custom CA: %s)', mode, protocol, ca !== undefined);

  if (protocol === 'grpc') {
    return {
      protocol,
      mode,
      channelCredentials: parseMaterial(protocol, () => credentials.createSsl(ca ?? null, key ?? null, cert ?? null))
    };
  }

  if (ca || cert || key) {
    // The agent only parses its TLS options on connect; check them up front.
    parseMaterial(protocol, () => createSecureContext({ ca, cert, key }));
  }

  return {
    protocol,
    mode,
    scheme: 'https',
    tls: {
      ca,
      cert,
      key,
      rejectUnauthorized: !tls.insecureVerify
    }
  };
}

function isMutual(tls: RemoteTlsConfig): boolean {
  const hasCert = tls.certFile !== undefined;
  const hasKey = tls.keyFile !== undefined;

  if (tls.mtls === true) {
    if (!hasCert || !hasKey) {
      throw new ConfigurationError('mTLS requires both certFile and keyFile');
    }
    return true;
  }
  if (tls.mtls === false) {
    return false;
  }
  if (hasCert !== hasKey) {
    throw new ConfigurationError(
      `Client ${hasCert ? 'keyFile' : 'certFile'} is missing; mTLS needs both a certificate and a key`
    );
  }
  return hasCert && hasKey;
}

function load(loader: CertificateLoader, path: string, what: string): Buffer {
  try {
    return loader(path);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Unable to read ${what} from ${path}: ${detail}`, { cause: err });
  }
}

function parseMaterial<T>(protocol: Protocol, parse: () => T): T {
  try {
    return parse();
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid TLS material for ${protocol}: ${detail}`, { cause: err });
  }
}
