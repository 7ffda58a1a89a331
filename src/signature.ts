import { ConfigurationError, RemoteError } from './errors';

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Converts one domain type to and from its wire forms.
 *
 * The HTTP protocol always uses the JSON pair. The gRPC protocol uses
 * `serialize`/`deserialize` when present and UTF-8 encoded JSON otherwise.
 */
export interface ValueType<T> {
  name: string;
  toJSON(value: T): JsonValue;
  fromJSON(json: unknown): T;
  serialize?(value: T): Uint8Array;
  deserialize?(bytes: Uint8Array): T;
}

export type Arity = 'one' | 'many';

export interface OperationShape<I = unknown, O = unknown> {
  inputArity: Arity;
  outputArity: Arity;
  inputType: ValueType<I>;
  outputType: ValueType<O>;
  /**
   * gRPC method name. Defaults to the operation name with its first letter upper-cased.
   */
  rpcMethod?: string;
  /**
   * HTTP task route segment. Defaults to the operation name.
   */
  httpPath?: string;
}

export type OperationMap = Record<string, OperationShape>;

export interface TargetSignature<Ops extends OperationMap = OperationMap> {
  /**
   * Identifier of the model on the remote runtime.
   */
  targetId: string;
  /**
   * Fully-qualified gRPC service that serves the operations.
   */
  serviceName: string;
  operations: Ops;
}

/**
 * The three call shapes an operation can have.
 */
export type CallKind = 'unary' | 'stream-in' | 'stream-out';

export const RESERVED_OPERATION_NAMES: readonly string[] = ['close', 'closed', 'connection', 'signature'];

const OPERATION_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function callKindOf(shape: OperationShape): CallKind {
  if (shape.inputArity === 'many') {
    return 'stream-in';
  }
  return shape.outputArity === 'many' ? 'stream-out' : 'unary';
}

/**
 * Validates a target signature and freezes it together with its operation table.
 * @throws ConfigurationError when a name, arity or value type is invalid.
 */
export function defineSignature<Ops extends OperationMap>(input: TargetSignature<Ops>): Readonly<TargetSignature<Ops>> {
  if (input.targetId.trim().length === 0) {
    throw new ConfigurationError('Target signature needs a targetId');
  }
  if (input.serviceName.trim().length === 0) {
    throw new ConfigurationError(`Target signature for ${input.targetId} needs a serviceName`);
  }

  const names = Object.keys(input.operations);
  if (names.length === 0) {
    throw new ConfigurationError(`Target signature for ${input.targetId} declares no operations`);
  }

  for (const name of names) {
    const shape = input.operations[name];
    if (!OPERATION_NAME.test(name)) {
      throw new ConfigurationError(`Operation name "${name}" is not a valid identifier`);
    }
    if (RESERVED_OPERATION_NAMES.includes(name)) {
      throw new ConfigurationError(`Operation name "${name}" is reserved by the remote model proxy`);
    }
    if (!isArity(shape.inputArity) || !isArity(shape.outputArity)) {
      throw new ConfigurationError(`Operation "${name}" has an unknown arity`);
    }
    if (shape.inputArity === 'many' && shape.outputArity === 'many') {
      throw new ConfigurationError(`Operation "${name}" streams in both directions, which is not supported`);
    }
    if (shape.rpcMethod !== undefined && !OPERATION_NAME.test(shape.rpcMethod)) {
      throw new ConfigurationError(`Operation "${name}" has an invalid rpcMethod "${shape.rpcMethod}"`);
    }
    if (shape.httpPath !== undefined && !/^[A-Za-z0-9._~-]+$/.test(shape.httpPath)) {
      throw new ConfigurationError(`Operation "${name}" has an invalid httpPath "${shape.httpPath}"`);
    }
  }

  return Object.freeze({
    targetId: input.targetId,
    serviceName: input.serviceName,
    operations: Object.freeze({ ...input.operations })
  });
}

/**
 * Transport names an operation may override.
 */
export type OperationRoutes = Pick<OperationShape, 'rpcMethod' | 'httpPath'>;

export type UnaryShape<I, O> = OperationShape<I, O> & { inputArity: 'one'; outputArity: 'one' };
export type StreamInShape<I, O> = OperationShape<I, O> & { inputArity: 'many'; outputArity: 'one' };
export type StreamOutShape<I, O> = OperationShape<I, O> & { inputArity: 'one'; outputArity: 'many' };

/**
 * One input, one output.
 */
export function unary<I, O>(inputType: ValueType<I>, outputType: ValueType<O>, routes: OperationRoutes = {}): UnaryShape<I, O> {
  return { inputArity: 'one', outputArity: 'one', inputType, outputType, ...routes };
}

/**
 * A sequence of inputs, one output.
 */
export function streamIn<I, O>(inputType: ValueType<I>, outputType: ValueType<O>, routes: OperationRoutes = {}): StreamInShape<I, O> {
  return { inputArity: 'many', outputArity: 'one', inputType, outputType, ...routes };
}

/**
 * One input, a sequence of outputs.
 */
export function streamOut<I, O>(inputType: ValueType<I>, outputType: ValueType<O>, routes: OperationRoutes = {}): StreamOutShape<I, O> {
  return { inputArity: 'one', outputArity: 'many', inputType, outputType, ...routes };
}

export function rpcMethodOf(name: string, shape: OperationShape): string {
  return shape.rpcMethod ?? name.charAt(0).toUpperCase() + name.slice(1);
}

export function httpPathOf(name: string, shape: OperationShape): string {
  return shape.httpPath ?? name;
}

function isArity(value: unknown): value is Arity {
  return value === 'one' || value === 'many';
}

/**
 * A value type that travels as plain JSON, checked by `guard` when decoded.
 */
export function jsonType<T extends JsonValue>(name: string, guard: (value: unknown) => value is T): ValueType<T> {
  return {
    name,
    toJSON: (value) => value,
    fromJSON: (json) => {
      if (!guard(json)) {
        throw new RemoteError(`Response is not a valid ${name}`, 'decode', undefined, json);
      }
      return json;
    }
  };
}

export const stringType: ValueType<string> = jsonType(
  'string',
  (value): value is string => typeof value === 'string'
);

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Encodes a value for the gRPC wire.
 */
export function toBytes<T>(type: ValueType<T>, value: T): Buffer {
  if (type.serialize) {
    return Buffer.from(type.serialize(value));
  }
  return Buffer.from(encoder.encode(JSON.stringify(type.toJSON(value))));
}

/**
 * Decodes a value from the gRPC wire.
 * @throws RemoteError with status `decode` when the bytes do not hold a valid value.
 */
export function fromBytes<T>(type: ValueType<T>, bytes: Uint8Array): T {
  if (type.deserialize) {
    return type.deserialize(bytes);
  }
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new RemoteError(`Unable to decode ${type.name} message`, 'decode', undefined, undefined, { cause: err });
  }
  return type.fromJSON(json);
}
