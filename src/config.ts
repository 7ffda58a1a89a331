import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Wire protocols a remote model can be reached over.
 */
export type Protocol = 'grpc' | 'http';

export const PROTOCOLS: readonly Protocol[] = ['grpc', 'http'];

/**
 * TLS configuration options for a remote connection.
 */
export interface RemoteTlsConfig {
  /**
   * Whether the connection uses TLS at all.
   */
  enabled: boolean;

  /**
   * Whether the client presents a certificate.
   * Implied when both `certFile` and `keyFile` are set.
   */
  mtls?: boolean;

  /**
   * Path to the CA certificate used to verify the server.
   * System trust roots are used when omitted.
   */
  caFile?: string;

  /**
   * Path to the client certificate file for mTLS.
   */
  certFile?: string;

  /**
   * Path to the client private key file for mTLS.
   */
  keyFile?: string;

  /**
   * Skip verification of the server's certificate. Only the HTTP protocol honors this.
   * @default false
   */
  insecureVerify?: boolean;
}

/**
 * Describes one remote endpoint.
 */
export interface RemoteConnection {
  /**
   * The host to connect to.
   */
  host: string;

  /**
   * The port to connect to.
   */
  port: number;

  /**
   * The wire protocol spoken by the endpoint.
   */
  protocol: Protocol;

  /**
   * TLS configuration. Plaintext when omitted.
   */
  tls?: RemoteTlsConfig;

  /**
   * Default deadline for each call, in milliseconds.
   */
  timeoutMs?: number;

  /**
   * Extra gRPC channel arguments, such as `grpc.max_receive_message_length`.
   */
  channelOptions?: Record<string, string | number>;
}

/**
 * Validates a connection descriptor and returns a frozen copy of it.
 * @throws ConfigurationError when the descriptor is malformed.
 */
export function createConnection(input: RemoteConnection): Readonly<RemoteConnection> {
  const host = input.host.trim();
  if (host.length === 0) {
    throw new ConfigurationError('Connection host must not be empty');
  }
  if (/\s|:\/\//.test(host)) {
    throw new ConfigurationError(`Connection host must be a bare host name, got "${input.host}"`);
  }
  if (!Number.isInteger(input.port) || input.port < 1 || input.port > 65535) {
    throw new ConfigurationError(`Connection port must be an integer between 1 and 65535, got ${input.port}`);
  }
  if (!PROTOCOLS.includes(input.protocol)) {
    throw new ConfigurationError(
      `Unknown protocol "${String(input.protocol)}", expected one of: ${PROTOCOLS.join(', ')}`
    );
  }
  if (input.timeoutMs !== undefined && (!Number.isInteger(input.timeoutMs) || input.timeoutMs <= 0)) {
    throw new ConfigurationError(`Connection timeoutMs must be a positive integer, got ${input.timeoutMs}`);
  }

  return Object.freeze({
    host,
    port: input.port,
    protocol: input.protocol,
    tls: input.tls ? Object.freeze({ ...input.tls }) : undefined,
    timeoutMs: input.timeoutMs,
    channelOptions: input.channelOptions ? Object.freeze({ ...input.channelOptions }) : undefined
  });
}

const tlsInfoSchema = z.object({
  enabled: z.boolean().default(false),
  mtls: z.boolean().optional(),
  ca_file: z.string().min(1).optional(),
  cert_file: z.string().min(1).optional(),
  key_file: z.string().min(1).optional(),
  insecure_verify: z.boolean().default(false)
});

const connectionInfoSchema = z
  .object({
    hostname: z.string().optional(),
    host: z.string().optional(),
    port: z.coerce.number().int(),
    protocol: z.enum(['grpc', 'http']).default('grpc'),
    timeout_ms: z.number().int().positive().optional(),
    options: z.record(z.union([z.string(), z.number()])).optional(),
    tls: tlsInfoSchema.optional()
  })
  .refine((info) => info.hostname !== undefined || info.host !== undefined, {
    message: 'either hostname or host is required',
    path: ['hostname']
  });

/**
 * Snake-case connection block as it appears in runtime configuration files.
 */
export type ConnectionInfo = z.input<typeof connectionInfoSchema>;

/**
 * Parses a snake_case connection block into a validated connection descriptor.
 * @throws ConfigurationError naming the first offending field.
 */
export function parseConnectionInfo(raw: unknown): Readonly<RemoteConnection> {
  const result = connectionInfoSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'connection';
    throw new ConfigurationError(`Invalid connection info at ${where}: ${issue?.message ?? 'invalid value'}`, {
      cause: result.error
    });
  }

  const info = result.data;
  return createConnection({
    host: info.hostname ?? info.host ?? '',
    port: info.port,
    protocol: info.protocol,
    timeoutMs: info.timeout_ms,
    channelOptions: info.options,
    tls: info.tls
      ? {
          enabled: info.tls.enabled,
          mtls: info.tls.mtls,
          caFile: info.tls.ca_file,
          certFile: info.tls.cert_file,
          keyFile: info.tls.key_file,
          insecureVerify: info.tls.insecure_verify
        }
      : undefined
  });
}

/**
 * Formats `host:port`, bracketing IPv6 literals.
 */
export function formatAuthority(host: string, port: number): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]:${port}` : `${host}:${port}`;
}
