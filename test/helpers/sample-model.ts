import { defineSignature, jsonType, streamIn, streamOut, unary } from '../../src';

export type SampleInput = { name: string };
export type SampleOutput = { greeting: string };

export const sampleInput = jsonType(
  'SampleInputType',
  (value: unknown): value is SampleInput =>
    typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string'
);

export const sampleOutput = jsonType(
  'SampleOutputType',
  (value: unknown): value is SampleOutput =>
    typeof value === 'object' && value !== null && 'greeting' in value && typeof value.greeting === 'string'
);

export const SAMPLE_MODEL_ID = 'sample-task-model';
export const SAMPLE_SERVICE = 'sample_lib.SampleTaskService';

/**
 * Operations served by the in-process test servers.
 */
export const sampleSignature = defineSignature({
  targetId: SAMPLE_MODEL_ID,
  serviceName: SAMPLE_SERVICE,
  operations: {
    run: unary(sampleInput, sampleOutput, { rpcMethod: 'SampleTaskPredict', httpPath: 'SampleTask' }),
    runStreamIn: streamIn(sampleInput, sampleOutput, {
      rpcMethod: 'ClientStreamingSampleTaskPredict',
      httpPath: 'SampleTask'
    }),
    runStreamOut: streamOut(sampleInput, sampleOutput, {
      rpcMethod: 'ServerStreamingSampleTaskPredict',
      httpPath: 'SampleTask'
    }),
    fail: unary(sampleInput, sampleOutput, { rpcMethod: 'Fail', httpPath: 'Fail' }),
    slow: unary(sampleInput, sampleOutput, { rpcMethod: 'Slow', httpPath: 'Slow' }),
    flaky: streamOut(sampleInput, sampleOutput, { rpcMethod: 'Flaky', httpPath: 'Flaky' }),
    ticker: streamOut(sampleInput, sampleOutput, { rpcMethod: 'Ticker', httpPath: 'Ticker' }),
    stall: streamOut(sampleInput, sampleOutput, { rpcMethod: 'Stall', httpPath: 'Stall' }),
    refuse: streamIn(sampleInput, sampleOutput, { rpcMethod: 'Refuse', httpPath: 'Refuse' })
  }
});

export const STREAM_OUT_COUNT = 10;
export const SLOW_DELAY_MS = 300;

export function nameOf(request: unknown): string {
  if (typeof request === 'object' && request !== null && 'name' in request && typeof request.name === 'string') {
    return request.name;
  }
  return '';
}

/**
 * Counts cancelled streams and remembers which model ids the server was asked for.
 */
export class ServerRecorder {
  readonly modelIds: string[] = [];
  readonly headers: Record<string, string>[] = [];
  cancelledStreams = 0;
  openStreams = 0;

  async waitForCancelled(count: number, timeoutMs = 2000): Promise<void> {
    await waitUntil(
      () => this.cancelledStreams >= count,
      () => `Expected ${count} cancelled stream(s), saw ${this.cancelledStreams}`,
      timeoutMs
    );
  }
}

/**
 * Polls `condition` until it holds, failing with `describe()` after `timeoutMs`.
 */
export async function waitUntil(condition: () => boolean, describe: () => string, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error(describe());
    }
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}
