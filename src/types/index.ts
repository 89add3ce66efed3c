/**
 * Core Types
 */

export type {
  ServiceContext,
  LoopHandle,
  Ambient,
  AmbientKey,
  RequestData,
  UploadedFile,
  RequestSource,
  RequestContext,
  RequestContextInit,
} from './context.js'

export {
  REQUEST_SOURCES,
  createRequestContext,
  getRequestData,
  isUploadedFile,
} from './context.js'

export type { HandlerArgs, HandlerFunction, Handler, HandlerWrapper } from './handlers.js'
