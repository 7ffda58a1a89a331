import { defineSignature, jsonType, streamIn, streamOut, unary } from '../../src';

export type GreetingRequest = { name: string };
export type Greeting = { greeting: string };

const greetingRequest = jsonType(
  'GreetingRequest',
  (value: unknown): value is GreetingRequest =>
    typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string'
);

const greeting = jsonType(
  'Greeting',
  (value: unknown): value is Greeting =>
    typeof value === 'object' && value !== null && 'greeting' in value && typeof value.greeting === 'string'
);

/**
 * A greeting model exposing one operation of each call shape.
 */
export const greetingSignature = defineSignature({
  targetId: 'greeting-model',
  serviceName: 'greetings.GreetingTaskService',
  operations: {
    greet: unary(greetingRequest, greeting, { rpcMethod: 'GreetingTaskPredict', httpPath: 'GreetingTask' }),
    greetAll: streamIn(greetingRequest, greeting, {
      rpcMethod: 'ClientStreamingGreetingTaskPredict',
      httpPath: 'GreetingTask'
    }),
    greetRepeatedly: streamOut(greetingRequest, greeting, {
      rpcMethod: 'ServerStreamingGreetingTaskPredict',
      httpPath: 'GreetingTask'
    })
  }
});
