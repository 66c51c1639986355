export * from './types';
export * from './errors';
export { HeaderBag } from './HeaderBag';
export { Message, parseProtocolVersion } from './Message';
export { Request } from './Request';
export { Response } from './Response';
export {
  getReasonPhrase,
  isValidStatusCode,
  MIN_STATUS_CODE,
  MAX_STATUS_CODE,
} from './status';
export type { Stream, StreamChunk } from './stream/Stream';
export { BufferStream } from './stream/BufferStream';
export { TempStream, DEFAULT_MAX_MEMORY } from './stream/TempStream';
export * from './body';
export {
  ConsoleLogger,
  sanitizeHeadersForLog,
  sanitizeHeaderLine,
} from './logger';
export { compileMiddleware, isMiddleware, isTransport } from './pipeline';
export {
  DEBUG_ENV_VAR,
  resolveShuttleConfig,
  shuttleOptionsSchema,
} from './config';
export type { ResolvedShuttleConfig } from './config';
export * from './middleware';
export { Shuttle, SHUTTLE_USER_AGENT, DEFAULT_USER_AGENT } from './Shuttle';
export { createDefaultShuttle } from './factories';
export type { DefaultShuttleOptions } from './factories';
export * from './transport/engine';
export { createAxiosEngine } from './transport/axiosEngine';
export type { AxiosEngineOptions } from './transport/axiosEngine';
export {
  NetworkTransport,
  ALLOWED_PROTOCOLS,
} from './transport/NetworkTransport';
export type {
  NetworkTransportOptions,
  TransportDefaults,
} from './transport/NetworkTransport';
export { ResponseHeaderParser } from './transport/ResponseHeaderParser';
export { ScriptedTransport } from './transport/ScriptedTransport';
export type {
  ResponseFactory,
  ScriptedEntry,
} from './transport/ScriptedTransport';
