export { RemoteModelInitializer, initRemoteModel } from './initializer';
export type { RemoteModel, RemoteModelHandle, OperationMethod } from './initializer';
export { createConnection, parseConnectionInfo } from './config';
export type { RemoteConnection, RemoteTlsConfig, Protocol, ConnectionInfo } from './config';
export { defineSignature, unary, streamIn, streamOut, jsonType, stringType } from './signature';
export type {
  TargetSignature,
  OperationShape,
  OperationMap,
  OperationRoutes,
  ValueType,
  JsonValue,
  Arity
} from './signature';
export { ResultStream } from './stream';
export type { StreamSource } from './stream';
export type { CallOptions, ProtocolClient } from './protocol-client';
export { GrpcProtocolClient, MODEL_ID_METADATA_KEY } from './grpc-client';
export { HttpProtocolClient } from './http-client';
export { resolveTransportSecurity } from './security';
export type { ResolvedCredentials, SecurityMode } from './security';
export {
  createInitializerSettings,
  loadInitializerSettings,
  fileCertificateLoader
} from './settings';
export type { InitializerSettings, CertificateLoader } from './settings';
export {
  RemoteModelError,
  ConfigurationError,
  ConnectionError,
  TimeoutError,
  RemoteError,
  StreamError,
  InvalidInputError,
  ClientClosedError
} from './errors';
