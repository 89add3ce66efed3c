/**
 * handlerkit - Component registry, injection and request validation for
 * MongoDB-backed handlers
 */

// === Core ===
export {
  createComponentRegistry,
  getComponent,
  defineProvider,
  isProviderDeclaration,
  createProviderNamespace,
  loadProviderNamespace,
  defineHandler,
  wrapHandler,
  applyWrappers,
  inject,
  resolveInjections,
} from './core/index.js'
export type {
  ComponentRegistry,
  RegistryBuilder,
  FrozenRegistry,
  RegistryOptions,
  RegistryPhase,
  ProviderDeclaration,
  ProviderOptions,
  ProviderModule,
  ProviderNamespace,
  ProviderLoaderOptions,
} from './core/index.js'

// === Types ===
export { REQUEST_SOURCES, createRequestContext, getRequestData, isUploadedFile } from './types/index.js'
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
  HandlerArgs,
  HandlerFunction,
  Handler,
  HandlerWrapper,
} from './types/index.js'

// === Errors ===
export {
  Errors,
  ErrorCodes,
  ServiceError,
  isServiceError,
  getErrorCode,
  getStatusForCode,
  isClientError,
  isServerError,
} from './errors/index.js'
export type { ErrorCode, ErrorCodeDef, FieldErrors } from './errors/index.js'

// === Config ===
export { loadConfig, defineConfig, ServiceConfigSchema } from './config/index.js'
export type { ServiceConfig, DuplicatePolicy } from './config/index.js'

// === Validation ===
export {
  createValidationEngine,
  createDefaultEngine,
  getDefaultEngine,
  CoercionError,
  DOCUMENT_EXISTS,
  isDocumentExists,
  isRecord,
} from './validation/index.js'
export type {
  ValidationEngine,
  ValidationEngineOptions,
  Schema,
  RuleSet,
  Document,
  ExistenceRule,
  ExistenceTarget,
  CheckContext,
  Coercion,
  CoercionOptions,
  DefaultSetter,
  FieldCheck,
  RuleCheck,
  TypeDefinition,
  CompiledSchema,
  ValidateOptions,
  ValidationResult,
  MalformedInputPolicy,
  DocumentExists,
} from './validation/index.js'

// === Adapters & Outcomes ===
export {
  validatePath,
  validateRequest,
  validateArgument,
  readValidated,
  VALIDATED_ARG,
  toOutcome,
  runHandler,
} from './http/index.js'
export type { AdapterOptions, ValidatedData, Outcome } from './http/index.js'

// === Query ===
export {
  createSortQuery,
  createGroupQuery,
  createFacetExtractQuery,
  createToStringsQuery,
  removeFieldIfEmptyQuery,
  customAggregate,
} from './query/index.js'
export type { SortDirection, GroupField, AggregateCursor, AggregateSource, AggregateQueryOptions } from './query/index.js'

// === Providers ===
export { providers, MONGO_CLIENT, DATABASE, isMongoClient, isDb, createDocumentExists } from './providers/index.js'
export type { DocumentStore } from './providers/index.js'

// === Service ===
export { startService } from './server/index.js'
export type { Service, ServiceOptions, ServiceRequestInit } from './server/index.js'

// === Logger ===
export { createLogger, getLogger, type Logger } from './utils/logger.js'
