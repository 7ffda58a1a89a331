import { once } from 'events';
import {
  Client,
  Metadata,
  status,
  type CallOptions as GrpcCallOptions,
  type ClientReadableStream,
  type ClientWritableStream,
  type ServiceError
} from '@grpc/grpc-js';
import Debug from 'debug';
import { formatAuthority } from './config';
import { ClientClosedError, ConnectionError, RemoteError, RemoteModelError, TimeoutError } from './errors';
import { timeoutFor, type CallOptions, type OperationRef, type ProtocolClient, type ProtocolClientOptions } from './protocol-client';
import type { GrpcCredentials } from './security';
import { fromBytes, rpcMethodOf, toBytes, type ValueType } from './signature';
import { ResultStream, type StreamSource } from './stream';

const debug = Debug('remote-model:client:grpc');

/**
 * Metadata key the inference runtime routes requests by.
 */
export const MODEL_ID_METADATA_KEY = 'mm-model-id';

export interface GrpcProtocolClientOptions extends ProtocolClientOptions {
  credentials: GrpcCredentials;
}

const passThrough = (bytes: Buffer): Buffer => bytes;

/**
 * Protocol client for the gRPC transport.
 *
 * Messages are encoded by the operation's value types, so the channel needs
 * no generated stubs: each call names its method path directly.
 */
export class GrpcProtocolClient implements ProtocolClient {
  readonly protocol = 'grpc';
  private readonly client: Client;
  private readonly address: string;
  private readonly inFlight = new Set<{ cancel(): void }>();
  private isClosed = false;

  constructor(private readonly options: GrpcProtocolClientOptions) {
    const { connection, credentials } = options;
    this.address = formatAuthority(connection.host, connection.port);
    debug('Creating %s channel to %s', credentials.mode, this.address);
    this.client = new Client(this.address, credentials.channelCredentials, { ...connection.channelOptions });
  }

  async callUnary<I, O>(operation: OperationRef<I, O>, input: I, call: CallOptions = {}): Promise<O> {
    const path = this.pathOf(operation);
    const timeoutMs = timeoutFor(this.options, call);
    const request = toBytes(operation.shape.inputType, input);
    debug('Unary call %s', path);

    const response = await new Promise<Buffer>((resolve, reject) => {
      const unaryCall = this.client.makeUnaryRequest(
        path,
        passThrough,
        passThrough,
        request,
        this.metadataFor(call),
        this.callOptionsFor(timeoutMs),
        (err, value) => {
          this.inFlight.delete(unaryCall);
          if (err) {
            reject(this.mapError(err, timeoutMs));
          } else if (value === undefined) {
            reject(new RemoteError(`${path} returned no message`, status.INTERNAL, status[status.INTERNAL]));
          } else {
            resolve(value);
          }
        }
      );
      this.inFlight.add(unaryCall);
    });
    return fromBytes(operation.shape.outputType, response);
  }

  async callStreamIn<I, O>(
    operation: OperationRef<I, O>,
    inputs: Iterable<I> | AsyncIterable<I>,
    call: CallOptions = {}
  ): Promise<O> {
    const path = this.pathOf(operation);
    const timeoutMs = timeoutFor(this.options, call);
    debug('Client-streaming call %s', path);

    const response = await new Promise<Buffer>((resolve, reject) => {
      const settled = new AbortController();
      const stream = this.client.makeClientStreamRequest(
        path,
        passThrough,
        passThrough,
        this.metadataFor(call),
        this.callOptionsFor(timeoutMs),
        (err, value) => {
          settled.abort();
          this.inFlight.delete(stream);
          if (err) {
            reject(this.mapError(err, timeoutMs));
          } else if (value === undefined) {
            reject(new RemoteError(`${path} returned no message`, status.INTERNAL, status[status.INTERNAL]));
          } else {
            resolve(value);
          }
        }
      );

      this.inFlight.add(stream);

      this.pump(stream, operation.shape.inputType, inputs, settled.signal).then(
        (sent) => {
          debug('Sent %d message(s) to %s, half-closing', sent, path);
          if (!settled.signal.aborted) {
            stream.end();
          }
        },
        (err: unknown) => {
          reject(err);
          stream.cancel();
        }
      );
    });
    return fromBytes(operation.shape.outputType, response);
  }

  callStreamOut<I, O>(operation: OperationRef<I, O>, input: I, call: CallOptions = {}): ResultStream<O> {
    const path = this.pathOf(operation);
    return new ResultStream(() => this.openServerStream(path, operation, input, call), `${this.address}${path}`);
  }

  /**
   * Cancels every call still in flight, then closes the channel.
   */
  async close(): Promise<void> {
    this.isClosed = true;
    debug('Closing channel to %s, cancelling %d call(s)', this.address, this.inFlight.size);
    for (const inFlight of this.inFlight) {
      inFlight.cancel();
    }
    this.inFlight.clear();
    this.client.close();
  }

  private openServerStream<I, O>(
    path: string,
    operation: OperationRef<I, O>,
    input: I,
    call: CallOptions
  ): StreamSource<O> {
    const timeoutMs = timeoutFor(this.options, call);
    const stream = this.client.makeServerStreamRequest(
      path,
      passThrough,
      passThrough,
      toBytes(operation.shape.inputType, input),
      this.metadataFor(call),
      this.callOptionsFor(timeoutMs)
    );
    // Keeps the CANCELLED status of a released stream from going unhandled.
    stream.on('error', (err: Error) => debug('%s closed: %s', path, err.message));
    this.inFlight.add(stream);

    return {
      iterator: this.readServerStream(path, stream, operation.shape.outputType, timeoutMs),
      cancel: () => stream.cancel()
    };
  }

  private async *readServerStream<O>(
    path: string,
    stream: ClientReadableStream<Buffer>,
    type: ValueType<O>,
    timeoutMs: number | undefined
  ): AsyncGenerator<O> {
    let completed = false;
    try {
      for await (const message of stream) {
        yield fromBytes(type, message);
      }
      completed = true;
    } catch (err) {
      if (isServiceError(err)) {
        completed = true;
        throw this.mapError(err, timeoutMs);
      }
      throw err;
    } finally {
      this.inFlight.delete(stream);
      if (!completed) {
        debug('Cancelling %s', path);
        stream.cancel();
      }
    }
  }

  private async pump<I>(
    stream: ClientWritableStream<Buffer>,
    type: ValueType<I>,
    inputs: Iterable<I> | AsyncIterable<I>,
    settled: AbortSignal
  ): Promise<number> {
    let sent = 0;
    for await (const input of inputs) {
      if (settled.aborted) {
        break;
      }
      // The call can end with a status while the buffer is full; drain never fires then.
      if (!stream.write(toBytes(type, input))) {
        await once(stream, 'drain', { signal: settled });
      }
      sent++;
    }
    return sent;
  }

  private pathOf(operation: OperationRef<unknown, unknown>): string {
    return `/${this.options.target.serviceName}/${rpcMethodOf(operation.name, operation.shape)}`;
  }

  private metadataFor(call: CallOptions): Metadata {
    const metadata = new Metadata();
    for (const [key, value] of Object.entries(call.metadata ?? {})) {
      metadata.set(key, value);
    }
    metadata.set(MODEL_ID_METADATA_KEY, this.options.target.targetId);
    return metadata;
  }

  private callOptionsFor(timeoutMs: number | undefined): GrpcCallOptions {
    return timeoutMs === undefined ? {} : { deadline: Date.now() + timeoutMs };
  }

  private mapError(err: ServiceError, timeoutMs: number | undefined): RemoteModelError {
    if (this.isClosed) {
      return new ClientClosedError(this.options.target.targetId);
    }
    switch (err.code) {
      case status.UNAVAILABLE:
        return new ConnectionError(`${this.address} is unavailable: ${err.details}`, { cause: err });
      case status.DEADLINE_EXCEEDED:
        return new TimeoutError(timeoutMs, { cause: err });
      default:
        return new RemoteError(err.details || err.message, err.code, status[err.code], err.metadata.getMap(), {
          cause: err
        });
    }
  }
}

function isServiceError(err: unknown): err is ServiceError {
  return err instanceof Error && 'code' in err && typeof err.code === 'number' && 'details' in err;
}
