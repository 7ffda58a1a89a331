import type { Protocol, RemoteConnection } from './config';
import type { OperationShape, TargetSignature } from './signature';
import type { ResultStream } from './stream';

/**
 * Per-call options accepted by every remote model method.
 */
export interface CallOptions {
  /**
   * Deadline for this call in milliseconds. Overrides the connection and initializer defaults.
   */
  timeoutMs?: number;

  /**
   * Extra request metadata, sent as gRPC metadata or HTTP headers.
   */
  metadata?: Record<string, string>;
}

/**
 * An operation as the protocol clients see it.
 */
export interface OperationRef<I, O> {
  name: string;
  shape: OperationShape<I, O>;
}

export interface ProtocolClientOptions {
  connection: Readonly<RemoteConnection>;
  target: Pick<TargetSignature, 'targetId' | 'serviceName'>;
  /**
   * Deadline used when neither the call nor the connection sets one.
   */
  defaultTimeoutMs?: number;
}

/**
 * Performs the three call shapes over one transport.
 *
 * One instance owns one channel or agent, created at construction and
 * never reconfigured; every call keeps its own request state.
 */
export interface ProtocolClient {
  readonly protocol: Protocol;

  callUnary<I, O>(operation: OperationRef<I, O>, input: I, options?: CallOptions): Promise<O>;

  callStreamIn<I, O>(
    operation: OperationRef<I, O>,
    inputs: Iterable<I> | AsyncIterable<I>,
    options?: CallOptions
  ): Promise<O>;

  callStreamOut<I, O>(operation: OperationRef<I, O>, input: I, options?: CallOptions): ResultStream<O>;

  /**
   * Releases the channel or agent.
   */
  close(): Promise<void>;
}

export function timeoutFor(options: ProtocolClientOptions, call: CallOptions): number | undefined {
  return call.timeoutMs ?? options.connection.timeoutMs ?? options.defaultTimeoutMs;
}
