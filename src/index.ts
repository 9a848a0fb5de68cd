/**
 * icinga-api-client
 *
 * Typed client for the Icinga 2 REST API.
 *
 * @example
 * ```typescript
 * import { IcingaClient, ServiceState } from 'icinga-api-client';
 *
 * const icinga = new IcingaClient({
 *   url: 'https://icinga.example.com:5665',
 *   username: 'apiuser',
 *   password: process.env.ICINGA_API_PASSWORD,
 * });
 *
 * const status = await icinga.getServiceState('web01', 'ping4');
 * if (status.state === ServiceState.CRITICAL) {
 *   await icinga.actions.acknowledgeProblem({
 *     target: { host: 'web01', service: 'ping4' },
 *     author: 'oncall',
 *     comment: 'Investigating',
 *   });
 * }
 * ```
 */

// Client
export {
  IcingaClient,
  createIcingaClient,
  createClientFromEnv,
  type IcingaClientOptions,
  type NewHostInput,
  type NewServiceInput,
  type CheckResultInput,
} from "./client.js";

// Configuration
export {
  loadConfig,
  resolveConfig,
  configFromEnv,
  configFromFile,
  mergeConfig,
  DEFAULT_URL,
  DEFAULT_TIMEOUT_MS,
  type ClientConfig,
  type ClientConfigInput,
} from "./config.js";

// Errors
export {
  ApiError,
  AuthenticationError,
  NotFoundError,
  ValidationError,
  TransportError,
  MalformedResponseError,
  isApiError,
  mapHttpError,
  type AnyApiError,
  type ApiErrorKind,
} from "./errors.js";

// Transport
export {
  TransportSession,
  encodeName,
  type ApiRequest,
  type HttpMethod,
  type RawResponse,
  type SessionOptions,
} from "./transport/session.js";

// Request builders
export * from "./endpoints/objects.js";
export * from "./endpoints/actions.js";
export * from "./endpoints/status.js";
export * from "./endpoints/config-packages.js";
export { buildSubscribe, type SubscribeOptions } from "./endpoints/events.js";

// Parsing
export { parse, validate, decodeResponse } from "./parse.js";

// Models
export type { ConfigObject } from "./models/common.js";
export type { CheckResult } from "./models/check-result.js";
export {
  composeDefinitions,
  hostConfigToAttrs,
  serviceConfigToAttrs,
  hostObjectSchema,
  serviceObjectSchema,
  type Host,
  type Service,
  type ServiceStatus,
  type HostConfig,
  type ServiceConfig,
  type ObjectDefinition,
} from "./models/objects.js";
export {
  EVENT_STREAM_TYPES,
  NotificationType,
  parseEvent,
  type EventStreamType,
  type IcingaEvent,
  type CheckResultEvent,
  type StateChangeEvent,
  type NotificationEvent,
  type AcknowledgementSetEvent,
  type AcknowledgementClearedEvent,
  type GenericEvent,
  type ObjectState,
} from "./models/events.js";
export type {
  ActionResult,
  StatusEntry,
  PerfdataValue,
  ConfigPackage,
  StageResult,
  StageFile,
  TypeInfo,
  TemplateInfo,
  VariableInfo,
} from "./models/results.js";

// Types
export {
  HostState,
  ServiceState,
  normalizeState,
  serviceStateName,
  hostStateName,
  type StateInput,
} from "./types/states.js";
export {
  OBJECT_TYPES,
  normalizeObjectType,
  pluralizeObjectType,
  isObjectType,
  type ObjectTypeName,
  type HostOrService,
} from "./types/object-types.js";
export type { JsonValue, JsonObject, JsonPrimitive } from "./types/json.js";

// Logging
export { logger, createLogger, type Logger } from "./logger.js";
