import {
  type Metadata,
  Server,
  ServerCredentials,
  status,
  type MethodDefinition,
  type ServerReadableStream,
  type ServerUnaryCall,
  type ServerWritableStream,
  type sendUnaryData,
  type ServiceDefinition,
  type UntypedServiceImplementation
} from '@grpc/grpc-js';
import { MODEL_ID_METADATA_KEY } from '../../src';
import { nameOf, SAMPLE_SERVICE, ServerRecorder, SLOW_DELAY_MS, STREAM_OUT_COUNT } from './sample-model';

const serialize = (value: unknown): Buffer => Buffer.from(JSON.stringify(value));
const deserialize = (bytes: Buffer): unknown => JSON.parse(bytes.toString('utf8'));

function method(name: string, requestStream: boolean, responseStream: boolean): MethodDefinition<unknown, unknown> {
  return {
    path: `/${SAMPLE_SERVICE}/${name}`,
    requestStream,
    responseStream,
    requestSerialize: serialize,
    requestDeserialize: deserialize,
    responseSerialize: serialize,
    responseDeserialize: deserialize
  };
}

const definition: ServiceDefinition<UntypedServiceImplementation> = {
  SampleTaskPredict: method('SampleTaskPredict', false, false),
  ClientStreamingSampleTaskPredict: method('ClientStreamingSampleTaskPredict', true, false),
  ServerStreamingSampleTaskPredict: method('ServerStreamingSampleTaskPredict', false, true),
  Fail: method('Fail', false, false),
  Slow: method('Slow', false, false),
  Flaky: method('Flaky', false, true),
  Ticker: method('Ticker', false, true),
  Stall: method('Stall', false, true),
  Refuse: method('Refuse', true, false)
};

export interface TestGrpcServer {
  port: number;
  recorder: ServerRecorder;
  stop(): Promise<void>;
}

/**
 * Starts an in-process gRPC server speaking the sample task service on 127.0.0.1.
 */
export async function startGrpcServer(credentials = ServerCredentials.createInsecure()): Promise<TestGrpcServer> {
  const recorder = new ServerRecorder();
  const server = new Server();

  const record = (call: { metadata: Metadata }): void => {
    const headers: Record<string, string> = {};
    for (const [key, value] of Object.entries(call.metadata.getMap())) {
      if (typeof value === 'string') {
        headers[key] = value;
      }
    }
    recorder.headers.push(headers);
    recorder.modelIds.push(headers[MODEL_ID_METADATA_KEY] ?? '');
  };

  const implementation: UntypedServiceImplementation = {
    SampleTaskPredict: (call: ServerUnaryCall<unknown, unknown>, callback: sendUnaryData<unknown>) => {
      record(call);
      callback(null, { greeting: `Hello ${nameOf(call.request)}` });
    },
    ClientStreamingSampleTaskPredict: (call: ServerReadableStream<unknown, unknown>, callback: sendUnaryData<unknown>) => {
      record(call);
      const names: string[] = [];
      call.on('data', (request: unknown) => names.push(nameOf(request)));
      call.on('end', () => callback(null, { greeting: `Hello ${names.join(',')}` }));
    },
    ServerStreamingSampleTaskPredict: (call: ServerWritableStream<unknown, unknown>) => {
      record(call);
      for (let i = 0; i < STREAM_OUT_COUNT; i++) {
        call.write({ greeting: `Hello ${nameOf(call.request)} stream` });
      }
      call.end();
    },
    Fail: (call: ServerUnaryCall<unknown, unknown>, callback: sendUnaryData<unknown>) => {
      record(call);
      callback({ code: status.INVALID_ARGUMENT, details: 'name is required' });
    },
    Slow: (call: ServerUnaryCall<unknown, unknown>, callback: sendUnaryData<unknown>) => {
      record(call);
      const timer = setTimeout(() => callback(null, { greeting: `Hello ${nameOf(call.request)}` }), SLOW_DELAY_MS);
      call.on('cancelled', () => clearTimeout(timer));
    },
    Flaky: (call: ServerWritableStream<unknown, unknown>) => {
      record(call);
      call.write({ greeting: 'Hello 1' });
      call.write({ greeting: 'Hello 2' });
      call.emit('error', { code: status.INTERNAL, details: 'model crashed' });
    },
    Ticker: (call: ServerWritableStream<unknown, unknown>) => {
      record(call);
      recorder.openStreams++;
      let sent = 0;
      const timer = setInterval(() => {
        sent++;
        call.write({ greeting: `tick ${sent}` });
        if (sent >= 2000) {
          clearInterval(timer);
          recorder.openStreams--;
          call.end();
        }
      }, 5);
      call.on('cancelled', () => {
        clearInterval(timer);
        recorder.openStreams--;
        recorder.cancelledStreams++;
      });
    },
    Stall: (call: ServerWritableStream<unknown, unknown>) => {
      record(call);
      recorder.openStreams++;
      call.write({ greeting: 'Hello 1' });
      call.on('cancelled', () => {
        recorder.openStreams--;
        recorder.cancelledStreams++;
      });
    },
    Refuse: (call: ServerReadableStream<unknown, unknown>, callback: sendUnaryData<unknown>) => {
      record(call);
      call.pause();
      callback({ code: status.RESOURCE_EXHAUSTED, details: 'input refused' });
    }
  };

  server.addService(definition, implementation);
  const port = await new Promise<number>((resolve, reject) => {
    server.bindAsync('127.0.0.1:0', credentials, (err, boundPort) => (err ? reject(err) : resolve(boundPort)));
  });

  return {
    port,
    recorder,
    stop: () =>
      new Promise<void>((resolve) => {
        server.tryShutdown(() => resolve());
        setTimeout(() => server.forceShutdown(), 500).unref();
      })
  };
}
