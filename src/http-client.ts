import Debug from 'debug';
import { Agent, fetch, type Response } from 'undici';
import { formatAuthority } from './config';
import {
  ClientClosedError,
  ConnectionError,
  InvalidInputError,
  RemoteError,
  RemoteModelError,
  TimeoutError
} from './errors';
import { timeoutFor, type CallOptions, type OperationRef, type ProtocolClient, type ProtocolClientOptions } from './protocol-client';
import type { HttpCredentials } from './security';
import { httpPathOf, type JsonValue } from './signature';
import { readServerSentEvents, type ServerSentEvent } from './sse';
import { ResultStream, type StreamSource } from './stream';

const debug = Debug('remote-model:client:http');

export const TASK_ROUTE_PREFIX = '/api/v1/task';

export interface HttpProtocolClientOptions extends ProtocolClientOptions {
  credentials: HttpCredentials;
  /**
   * Largest input sequence buffered for a stream-in call.
   */
  maxStreamInItems: number;
}

/**
 * Abort and deadline handling for one HTTP exchange.
 */
class CallScope {
  private readonly controller = new AbortController();
  private readonly timer?: NodeJS.Timeout;
  private expired = false;

  constructor(readonly timeoutMs: number | undefined) {
    if (timeoutMs !== undefined) {
      this.timer = setTimeout(() => {
        this.expired = true;
        this.controller.abort(new TimeoutError(timeoutMs));
      }, timeoutMs);
      this.timer.unref();
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  finish(): void {
    clearTimeout(this.timer);
  }

  release(): void {
    clearTimeout(this.timer);
    this.controller.abort();
  }
}

/**
 * Protocol client for the HTTP transport.
 *
 * HTTP has no client-streaming primitive the runtime accepts, so stream-in
 * input is materialized (up to `maxStreamInItems`) and posted as one batch.
 * Unlike the gRPC client it cannot consume infinite input sequences.
 */
export class HttpProtocolClient implements ProtocolClient {
  readonly protocol = 'http';
  private readonly agent: Agent;
  private readonly baseUrl: string;
  private readonly inFlight = new Set<CallScope>();
  private isClosed = false;

  constructor(private readonly options: HttpProtocolClientOptions) {
    const { connection, credentials } = options;
    this.baseUrl = `${credentials.scheme}://${formatAuthority(connection.host, connection.port)}`;
    debug('Creating %s client for %s', credentials.mode, this.baseUrl);
    this.agent = new Agent({ connect: credentials.tls ? { ...credentials.tls } : undefined });
  }

  async callUnary<I, O>(operation: OperationRef<I, O>, input: I, call: CallOptions = {}): Promise<O> {
    const route = httpPathOf(operation.name, operation.shape);
    const body = { model_id: this.options.target.targetId, inputs: operation.shape.inputType.toJSON(input) };
    return this.exchange(operation, route, body, call);
  }

  async callStreamIn<I, O>(
    operation: OperationRef<I, O>,
    inputs: Iterable<I> | AsyncIterable<I>,
    call: CallOptions = {}
  ): Promise<O> {
    const limit = this.options.maxStreamInItems;
    const batch: JsonValue[] = [];
    for await (const input of inputs) {
      if (batch.length >= limit) {
        throw new InvalidInputError(
          `${operation.name} input exceeds ${limit} item(s); HTTP stream-in sends the whole sequence in one request`
        );
      }
      batch.push(operation.shape.inputType.toJSON(input));
    }
    debug('Materialized %d input(s) for %s', batch.length, operation.name);

    const route = `client-streaming-${httpPathOf(operation.name, operation.shape)}`;
    return this.exchange(operation, route, { model_id: this.options.target.targetId, inputs: batch }, call);
  }

  callStreamOut<I, O>(operation: OperationRef<I, O>, input: I, call: CallOptions = {}): ResultStream<O> {
    const route = `server-streaming-${httpPathOf(operation.name, operation.shape)}`;
    return new ResultStream(
      () => this.openEventStream(operation, route, input, call),
      `${this.baseUrl}${TASK_ROUTE_PREFIX}/${route}`
    );
  }

  /**
   * Aborts every request still in flight, then tears down the agent's sockets.
   */
  async close(): Promise<void> {
    this.isClosed = true;
    debug('Closing client for %s, aborting %d request(s)', this.baseUrl, this.inFlight.size);
    for (const scope of this.inFlight) {
      scope.release();
    }
    this.inFlight.clear();
    await this.agent.destroy();
  }

  private track(call: CallOptions): CallScope {
    const scope = new CallScope(timeoutFor(this.options, call));
    this.inFlight.add(scope);
    return scope;
  }

  private untrack(scope: CallScope): void {
    this.inFlight.delete(scope);
  }

  private async exchange<I, O>(
    operation: OperationRef<I, O>,
    route: string,
    body: { model_id: string; inputs: JsonValue },
    call: CallOptions
  ): Promise<O> {
    const scope = this.track(call);
    try {
      const response = await this.post(route, body, 'application/json', call, scope);
      let text: string;
      try {
        text = await response.text();
      } catch (err) {
        throw this.mapFailure(err, scope);
      }
      return operation.shape.outputType.fromJSON(parseJson(text, operation.shape.outputType.name));
    } finally {
      scope.finish();
      this.untrack(scope);
    }
  }

  private openEventStream<I, O>(
    operation: OperationRef<I, O>,
    route: string,
    input: I,
    call: CallOptions
  ): StreamSource<O> {
    const scope = this.track(call);
    return {
      iterator: this.readEventStream(operation, route, input, call, scope),
      cancel: () => scope.release()
    };
  }

  private async *readEventStream<I, O>(
    operation: OperationRef<I, O>,
    route: string,
    input: I,
    call: CallOptions,
    scope: CallScope
  ): AsyncGenerator<O> {
    let completed = false;
    try {
      const body = { model_id: this.options.target.targetId, inputs: operation.shape.inputType.toJSON(input) };
      const response = await this.post(route, body, 'text/event-stream', call, scope);
      if (!response.body) {
        throw new RemoteError(`${route} returned an empty stream`, response.status, response.statusText);
      }

      try {
        for await (const event of readServerSentEvents(response.body)) {
          if (event.event === 'error') {
            throw eventError(route, event, response.status);
          }
          yield operation.shape.outputType.fromJSON(parseJson(event.data, operation.shape.outputType.name));
        }
      } catch (err) {
        throw this.mapFailure(err, scope);
      }
      completed = true;
    } finally {
      this.untrack(scope);
      if (completed) {
        scope.finish();
      } else {
        debug('Aborting %s', route);
        scope.release();
      }
    }
  }

  private async post(
    route: string,
    body: { model_id: string; inputs: JsonValue },
    accept: string,
    call: CallOptions,
    scope: CallScope
  ): Promise<Response> {
    const url = `${this.baseUrl}${TASK_ROUTE_PREFIX}/${route}`;
    debug('POST %s', url);

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { ...call.metadata, 'content-type': 'application/json', accept },
        body: JSON.stringify(body),
        dispatcher: this.agent,
        signal: scope.signal
      });
    } catch (err) {
      throw this.mapFailure(err, scope);
    }

    if (!response.ok) {
      throw await this.statusError(route, response, scope);
    }
    return response;
  }

  private async statusError(route: string, response: Response, scope: CallScope): Promise<RemoteModelError> {
    let text: string;
    try {
      text = await response.text();
    } catch (err) {
      return this.mapFailure(err, scope);
    }

    const payload = response.headers.get('content-type')?.includes('application/json') ? parseLenient(text) : text;
    const details = detailsOf(payload) ?? (text || response.statusText);
    return new RemoteError(`HTTP ${response.status} from ${route}: ${details}`, response.status, response.statusText, payload);
  }

  private mapFailure(err: unknown, scope: CallScope): RemoteModelError {
    if (err instanceof RemoteModelError) {
      return err;
    }
    if (this.isClosed) {
      return new ClientClosedError(this.options.target.targetId);
    }
    if (scope.timedOut) {
      return new TimeoutError(scope.timeoutMs, { cause: err });
    }
    const reason = err instanceof Error && err.cause instanceof Error ? err.cause : err;
    const detail = reason instanceof Error ? reason.message : String(reason);
    return new ConnectionError(`Request to ${this.baseUrl} failed: ${detail}`, { cause: err });
  }
}

function parseJson(text: string, typeName: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new RemoteError(`Unable to decode ${typeName} response`, 'decode', undefined, text, { cause: err });
  }
}

/**
 * Parses JSON error bodies, keeping the raw text when they are not JSON.
 */
function parseLenient(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return text;
  }
}

function detailsOf(payload: unknown): string | undefined {
  if (typeof payload === 'object' && payload !== null && 'details' in payload && typeof payload.details === 'string') {
    return payload.details;
  }
  return undefined;
}

function eventError(route: string, event: ServerSentEvent, httpStatus: number): RemoteError {
  const payload = parseLenient(event.data);
  const code =
    typeof payload === 'object' && payload !== null && 'code' in payload && typeof payload.code === 'number'
      ? payload.code
      : httpStatus;
  return new RemoteError(`${route} reported an error: ${detailsOf(payload) ?? event.data}`, code, 'error event', payload);
}
