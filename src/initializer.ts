import Debug from 'debug';
import { createConnection, type RemoteConnection } from './config';
import { ClientClosedError, InvalidInputError } from './errors';
import { GrpcProtocolClient } from './grpc-client';
import { HttpProtocolClient } from './http-client';
import type { CallOptions, OperationRef, ProtocolClient } from './protocol-client';
import { resolveTransportSecurity, type ResolvedCredentials } from './security';
import { createInitializerSettings, type InitializerSettings } from './settings';
import {
  callKindOf,
  defineSignature,
  type OperationMap,
  type OperationShape,
  type TargetSignature,
  type ValueType
} from './signature';
import { ResultStream } from './stream';

const debug = Debug('remote-model:initializer');

type InputOf<S extends OperationShape> = S['inputType'] extends ValueType<infer I> ? I : never;
type OutputOf<S extends OperationShape> = S['outputType'] extends ValueType<infer O> ? O : never;

/**
 * The proxy method generated for one operation shape.
 */
export type OperationMethod<S extends OperationShape> = S['inputArity'] extends 'many'
  ? (inputs: Iterable<InputOf<S>> | AsyncIterable<InputOf<S>>, options?: CallOptions) => Promise<OutputOf<S>>
  : S['outputArity'] extends 'many'
    ? (input: InputOf<S>, options?: CallOptions) => ResultStream<OutputOf<S>>
    : (input: InputOf<S>, options?: CallOptions) => Promise<OutputOf<S>>;

export type RemoteModelHandle<Ops extends OperationMap> = {
  readonly signature: Readonly<TargetSignature<Ops>>;
  readonly connection: Readonly<RemoteConnection>;
  /**
   * Whether `close()` has been called.
   */
  readonly closed: boolean;
  /**
   * Releases the channel or agent. Later calls reject with ClientClosedError.
   */
  close(): Promise<void>;
};

/**
 * A remote model: one method per declared operation, plus its handle.
 */
export type RemoteModel<Ops extends OperationMap> = {
  readonly [K in keyof Ops]: OperationMethod<Ops[K]>;
} & RemoteModelHandle<Ops>;

type Forwarder = (input: unknown, options?: CallOptions) => Promise<unknown> | ResultStream<unknown>;

interface ProxyState {
  closed: boolean;
}

/**
 * Builds remote models from a target signature and a connection descriptor.
 */
export class RemoteModelInitializer {
  private readonly settings: InitializerSettings;

  /**
   * @param settings Overrides for the defaults of `createInitializerSettings`.
   * @param instanceName Prefix for this initializer's log lines.
   */
  constructor(settings: Partial<InitializerSettings> = {}, readonly instanceName = 'default') {
    this.settings = createInitializerSettings(settings);
  }

  /**
   * Validates both descriptors, resolves transport security and returns a
   * ready proxy. Nothing is sent over the network until the first call.
   * @throws ConfigurationError for any invalid descriptor or security combination.
   */
  init<Ops extends OperationMap>(signature: TargetSignature<Ops>, connection: RemoteConnection): RemoteModel<Ops> {
    const target = defineSignature(signature);
    const endpoint = createConnection(connection);
    const credentials = resolveTransportSecurity(endpoint.tls, endpoint.protocol, this.settings.certificateLoader);
    const client = this.createClient(target, endpoint, credentials);
    const state: ProxyState = { closed: false };

    const methods: Record<string, Forwarder> = {};
    for (const [name, shape] of Object.entries(target.operations)) {
      methods[name] = forwarderFor(client, { name, shape }, target.targetId, state);
    }

    const model = Object.defineProperties<Record<string, unknown>>(methods, {
      signature: { value: target, enumerable: true },
      connection: { value: endpoint, enumerable: true },
      closed: { get: () => state.closed, enumerable: true },
      close: {
        value: async (): Promise<void> => {
          if (state.closed) {
            return;
          }
          state.closed = true;
          debug('[%s] Closing %s', this.instanceName, target.targetId);
          await client.close();
        }
      }
    });

    debug(
      '[%s] Initialized %s at %s:%d over %s (%s), operations: %s',
      this.instanceName,
      target.targetId,
      endpoint.host,
      endpoint.port,
      endpoint.protocol,
      credentials.mode,
      Object.keys(methods).join(', ')
    );
    // The table above holds exactly one forwarder per key of Ops.
    return Object.freeze(model) as RemoteModel<Ops>;
  }

  private createClient(
    target: Pick<TargetSignature, 'targetId' | 'serviceName'>,
    connection: Readonly<RemoteConnection>,
    credentials: ResolvedCredentials
  ): ProtocolClient {
    const defaultTimeoutMs = this.settings.defaultTimeoutMs;
    switch (credentials.protocol) {
      case 'grpc':
        return new GrpcProtocolClient({ connection, target, credentials, defaultTimeoutMs });
      case 'http':
        return new HttpProtocolClient({
          connection,
          target,
          credentials,
          defaultTimeoutMs,
          maxStreamInItems: this.settings.maxStreamInItems
        });
    }
  }
}

/**
 * Shorthand for `new RemoteModelInitializer(settings).init(signature, connection)`.
 */
export function initRemoteModel<Ops extends OperationMap>(
  signature: TargetSignature<Ops>,
  connection: RemoteConnection,
  settings?: Partial<InitializerSettings>
): RemoteModel<Ops> {
  return new RemoteModelInitializer(settings).init(signature, connection);
}

function forwarderFor(
  client: ProtocolClient,
  operation: OperationRef<unknown, unknown>,
  targetId: string,
  state: ProxyState
): Forwarder {
  const ensureOpen = (): void => {
    if (state.closed) {
      throw new ClientClosedError(targetId);
    }
  };

  switch (callKindOf(operation.shape)) {
    case 'unary':
      return async (input, options) => {
        ensureOpen();
        assertSingle(operation.name, input);
        return client.callUnary(operation, input, options);
      };
    case 'stream-in':
      return async (inputs, options) => {
        ensureOpen();
        if (!isSequence(inputs)) {
          throw new InvalidInputError(`${operation.name} expects an iterable or async iterable of inputs`);
        }
        return client.callStreamIn(operation, inputs, options);
      };
    case 'stream-out':
      return (input, options) => {
        ensureOpen();
        assertSingle(operation.name, input);
        return client.callStreamOut(operation, input, options);
      };
  }
}

function isSequence(value: unknown): value is Iterable<unknown> | AsyncIterable<unknown> {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return Symbol.iterator in value || Symbol.asyncIterator in value;
}

/**
 * Rejects streams and iterators passed where one value is expected.
 * Arrays stay allowed: a single value may itself be a list.
 */
function assertSingle(name: string, value: unknown): void {
  const streaming =
    value instanceof ResultStream ||
    (typeof value === 'object' &&
      value !== null &&
      (Symbol.asyncIterator in value || ('next' in value && typeof value.next === 'function')));
  if (streaming) {
    throw new InvalidInputError(`${name} expects a single input, not a stream`);
  }
}
