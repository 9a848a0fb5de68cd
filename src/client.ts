/**
 * Icinga API Client
 *
 * Type-safe client for the Icinga 2 REST API. Every call is one
 * request/response exchange; nothing is retried or cached.
 */

import type { z } from "zod";
import { loadConfig, resolveConfig, type ClientConfig, type ClientConfigInput } from "./config.js";
import { NotFoundError } from "./errors.js";
import {
  buildAcknowledgeProblem,
  buildAddComment,
  buildDelayNotification,
  buildGenerateTicket,
  buildProcessCheckResult,
  buildRemoveAcknowledgement,
  buildRemoveComment,
  buildRemoveDowntime,
  buildRescheduleCheck,
  buildRestartProcess,
  buildScheduleDowntime,
  buildSendCustomNotification,
  buildShutdownProcess,
  referenceName,
  type AcknowledgeProblemInput,
  type AddCommentInput,
  type DelayNotificationInput,
  type ProcessCheckResultInput,
  type RemovalTarget,
  type RemoveAcknowledgementInput,
  type RescheduleCheckInput,
  type ScheduleDowntimeInput,
  type SendCustomNotificationInput,
} from "./endpoints/actions.js";
import {
  buildCreatePackage,
  buildCreateStage,
  buildDeletePackage,
  buildDeleteStage,
  buildFetchStageFile,
  buildListPackages,
  buildListStageFiles,
  type CreateStageOptions,
} from "./endpoints/config-packages.js";
import { buildSubscribe, decodeEvents, readAll, type SubscribeOptions } from "./endpoints/events.js";
import {
  buildCreateObject,
  buildDeleteObjects,
  buildListObjects,
  buildUpdateObject,
  type CreateObjectOptions,
  type DeleteObjectsOptions,
  type FilterOptions,
  type ListObjectsOptions,
} from "./endpoints/objects.js";
import {
  buildListStatus,
  buildListTemplates,
  buildListTypes,
  buildListVariables,
} from "./endpoints/status.js";
import { configObjectSchema, resultsEnvelope, type ConfigObject } from "./models/common.js";
import type { IcingaEvent } from "./models/events.js";
import {
  SERVICE_STATUS_ATTRS,
  composeDefinitions,
  hostConfigToAttrs,
  hostObjectSchema,
  serviceConfigToAttrs,
  serviceObjectSchema,
  serviceStatusSchema,
  type Host,
  type HostConfig,
  type Service,
  type ServiceConfig,
  type ServiceStatus,
} from "./models/objects.js";
import {
  actionResultSchema,
  configPackageSchema,
  stageFileSchema,
  stageResultSchema,
  statusEntrySchema,
  templateInfoSchema,
  typeInfoSchema,
  variableInfoSchema,
  type ActionResult,
  type ConfigPackage,
  type StageFile,
  type StageResult,
  type StatusEntry,
  type TemplateInfo,
  type TypeInfo,
  type VariableInfo,
} from "./models/results.js";
import { decodeResponse, errorFromResponse, isSuccess } from "./parse.js";
import {
  TransportSession,
  type ApiRequest,
  type SessionOptions,
} from "./transport/session.js";
import type { JsonObject } from "./types/json.js";
import type { ObjectTypeName } from "./types/object-types.js";
import type { StateInput } from "./types/states.js";

/**
 * Client configuration
 */
export interface IcingaClientOptions extends ClientConfigInput, SessionOptions {}

const actionResults = resultsEnvelope(actionResultSchema);
const configObjects = resultsEnvelope(configObjectSchema);

export interface NewHostInput extends HostConfig {
  templates?: string[];
}

export interface NewServiceInput extends ServiceConfig {
  templates?: string[];
}

export interface CheckResultInput
  extends Omit<ProcessCheckResultInput, "target" | "exitStatus" | "pluginOutput"> {
  exitStatus: StateInput;
  pluginOutput: string;
}

/**
 * Icinga API Client
 */
export class IcingaClient {
  readonly config: ClientConfig;
  private session: TransportSession;

  constructor(options: IcingaClientOptions = {}) {
    const { adapter, logger, ...config } = options;
    this.config = resolveConfig(config);
    this.session = new TransportSession(this.config, { adapter, logger });
  }

  /**
   * Execute a request and decode the body into the given shape
   */
  private async request<S extends z.ZodTypeAny>(
    request: ApiRequest,
    schema: S
  ): Promise<z.output<S>> {
    const response = await this.session.execute(request);
    return decodeResponse(response, schema);
  }

  /**
   * Execute a request whose successful response is plain text
   */
  private async requestText(request: ApiRequest): Promise<string> {
    const response = await this.session.execute(request);
    if (!isSuccess(response.status)) {
      throw errorFromResponse(response);
    }
    return response.body;
  }

  // ==================== Objects ====================

  /**
   * Configuration object methods
   */
  objects = {
    /**
     * Query objects of one type, optionally filtered
     */
    list: async (type: ObjectTypeName, options?: ListObjectsOptions): Promise<ConfigObject[]> => {
      return this.request(buildListObjects(type, options), configObjects);
    },

    /**
     * Get a single object by its full name (`host` or `host!service`)
     */
    get: async (
      type: ObjectTypeName,
      name: string,
      options: Omit<ListObjectsOptions, "name" | "filter" | "filterVars"> = {}
    ): Promise<ConfigObject> => {
      const [object] = await this.objects.list(type, { ...options, name });
      if (!object) {
        throw new NotFoundError(`No ${type} named "${name}"`);
      }
      return object;
    },

    /**
     * Create an object from templates and attributes
     */
    create: async (
      type: ObjectTypeName,
      name: string,
      options?: CreateObjectOptions
    ): Promise<ActionResult[]> => {
      return this.request(buildCreateObject(type, name, options), actionResults);
    },

    /**
     * Modify attributes of an existing object
     */
    update: async (
      type: ObjectTypeName,
      name: string,
      attrs: JsonObject
    ): Promise<ActionResult[]> => {
      return this.request(buildUpdateObject(type, name, attrs), actionResults);
    },

    /**
     * Delete an object by name or all objects matching a filter
     */
    delete: async (type: ObjectTypeName, options: DeleteObjectsOptions): Promise<ActionResult[]> => {
      return this.request(buildDeleteObjects(type, options), actionResults);
    },
  };

  // ==================== Hosts & Services ====================

  async listHosts(options: FilterOptions = {}): Promise<Host[]> {
    return this.request(buildListObjects("Host", options), resultsEnvelope(hostObjectSchema));
  }

  async getHost(name: string): Promise<Host> {
    const [host] = await this.request(
      buildListObjects("Host", { name }),
      resultsEnvelope(hostObjectSchema)
    );
    if (!host) {
      throw new NotFoundError(`No Host named "${name}"`);
    }
    return host;
  }

  async listServices(options: FilterOptions = {}): Promise<Service[]> {
    return this.request(
      buildListObjects("Service", options),
      resultsEnvelope(serviceObjectSchema)
    );
  }

  async getService(host: string, service: string): Promise<Service> {
    const name = referenceName({ host, service });
    const [result] = await this.request(
      buildListObjects("Service", { name }),
      resultsEnvelope(serviceObjectSchema)
    );
    if (!result) {
      throw new NotFoundError(`No Service named "${name}"`);
    }
    return result;
  }

  /**
   * Current state and plugin output of one service
   */
  async getServiceState(host: string, service: string): Promise<ServiceStatus> {
    const name = referenceName({ host, service });
    const [status] = await this.request(
      buildListObjects("Service", { name, attrs: SERVICE_STATUS_ATTRS }),
      resultsEnvelope(serviceStatusSchema)
    );
    if (!status) {
      throw new NotFoundError(`No Service named "${name}"`);
    }
    return status;
  }

  /**
   * Create a host; the configured `newHostDefaults` are applied first
   */
  async createHost(name: string, input: NewHostInput = {}): Promise<ActionResult[]> {
    const { templates, ...config } = input;
    const definition = composeDefinitions(this.config.newHostDefaults, {
      templates,
      attrs: hostConfigToAttrs(config),
    });
    return this.objects.create("Host", name, definition);
  }

  /**
   * Create a service; the configured `newServiceDefaults` are applied first
   */
  async createService(
    host: string,
    service: string,
    input: NewServiceInput = {}
  ): Promise<ActionResult[]> {
    const { templates, ...config } = input;
    const definition = composeDefinitions(this.config.newServiceDefaults, {
      templates,
      attrs: serviceConfigToAttrs(config),
    });
    return this.objects.create("Service", referenceName({ host, service }), definition);
  }

  async sendServiceCheckResult(
    host: string,
    service: string,
    input: CheckResultInput
  ): Promise<ActionResult[]> {
    return this.actions.processCheckResult({ ...input, target: { host, service } });
  }

  async sendHostCheckResult(host: string, input: CheckResultInput): Promise<ActionResult[]> {
    return this.actions.processCheckResult({ ...input, target: { host } });
  }

  // ==================== Actions ====================

  /**
   * Action methods
   */
  actions = {
    processCheckResult: async (input: ProcessCheckResultInput): Promise<ActionResult[]> => {
      return this.request(buildProcessCheckResult(input), actionResults);
    },

    rescheduleCheck: async (input: RescheduleCheckInput): Promise<ActionResult[]> => {
      return this.request(buildRescheduleCheck(input), actionResults);
    },

    sendCustomNotification: async (
      input: SendCustomNotificationInput
    ): Promise<ActionResult[]> => {
      return this.request(buildSendCustomNotification(input), actionResults);
    },

    delayNotification: async (input: DelayNotificationInput): Promise<ActionResult[]> => {
      return this.request(buildDelayNotification(input), actionResults);
    },

    acknowledgeProblem: async (input: AcknowledgeProblemInput): Promise<ActionResult[]> => {
      return this.request(buildAcknowledgeProblem(input), actionResults);
    },

    removeAcknowledgement: async (
      input: RemoveAcknowledgementInput
    ): Promise<ActionResult[]> => {
      return this.request(buildRemoveAcknowledgement(input), actionResults);
    },

    addComment: async (input: AddCommentInput): Promise<ActionResult[]> => {
      return this.request(buildAddComment(input), actionResults);
    },

    removeComment: async (target: RemovalTarget, author?: string): Promise<ActionResult[]> => {
      return this.request(buildRemoveComment(target, author), actionResults);
    },

    scheduleDowntime: async (input: ScheduleDowntimeInput): Promise<ActionResult[]> => {
      return this.request(buildScheduleDowntime(input), actionResults);
    },

    removeDowntime: async (target: RemovalTarget, author?: string): Promise<ActionResult[]> => {
      return this.request(buildRemoveDowntime(target, author), actionResults);
    },

    /**
     * Shut down the Icinga process. The response may never arrive.
     */
    shutdownProcess: async (): Promise<ActionResult[]> => {
      return this.request(buildShutdownProcess(), actionResults);
    },

    /**
     * Restart the Icinga process. The response may never arrive.
     */
    restartProcess: async (): Promise<ActionResult[]> => {
      return this.request(buildRestartProcess(), actionResults);
    },

    generateTicket: async (cn: string): Promise<ActionResult[]> => {
      return this.request(buildGenerateTicket(cn), actionResults);
    },
  };

  // ==================== Events ====================

  /**
   * Event stream methods
   */
  events = {
    /**
     * Subscribe to an event stream. The connection stays open until the
     * iterator is closed or the server ends it.
     */
    subscribe: (options: SubscribeOptions): AsyncGenerator<IcingaEvent> => {
      const request = buildSubscribe(options);
      const session = this.session;

      return (async function* () {
        const { status, stream } = await session.stream(request);
        if (!isSuccess(status)) {
          throw errorFromResponse({ status, body: await readAll(stream) });
        }
        try {
          yield* decodeEvents(stream);
        } finally {
          stream.destroy();
        }
      })();
    },
  };

  // ==================== Status ====================

  status = {
    /**
     * Status and statistics, optionally limited to one component
     */
    list: async (statusType?: string): Promise<StatusEntry[]> => {
      return this.request(buildListStatus(statusType), resultsEnvelope(statusEntrySchema));
    },
  };

  // ==================== Config packages ====================

  /**
   * Configuration package and stage methods
   */
  packages = {
    create: async (packageName: string): Promise<ActionResult[]> => {
      return this.request(buildCreatePackage(packageName), actionResults);
    },

    list: async (): Promise<ConfigPackage[]> => {
      return this.request(buildListPackages(), resultsEnvelope(configPackageSchema));
    },

    delete: async (packageName: string): Promise<ActionResult[]> => {
      return this.request(buildDeletePackage(packageName), actionResults);
    },

    /**
     * Upload files as a new stage; validation happens asynchronously on the server
     */
    createStage: async (
      packageName: string,
      files: Record<string, string>,
      options?: CreateStageOptions
    ): Promise<StageResult[]> => {
      return this.request(
        buildCreateStage(packageName, files, options),
        resultsEnvelope(stageResultSchema)
      );
    },

    listStageFiles: async (packageName: string, stageName: string): Promise<StageFile[]> => {
      return this.request(
        buildListStageFiles(packageName, stageName),
        resultsEnvelope(stageFileSchema)
      );
    },

    fetchStageFile: async (
      packageName: string,
      stageName: string,
      relativePath: string
    ): Promise<string> => {
      return this.requestText(buildFetchStageFile(packageName, stageName, relativePath));
    },

    /**
     * Startup log of a stage deployment, listing validation errors
     */
    getStageErrors: async (packageName: string, stageName: string): Promise<string> => {
      return this.requestText(buildFetchStageFile(packageName, stageName, "startup.log"));
    },

    deleteStage: async (packageName: string, stageName: string): Promise<ActionResult[]> => {
      return this.request(buildDeleteStage(packageName, stageName), actionResults);
    },
  };

  // ==================== Introspection ====================

  types = {
    list: async (type?: ObjectTypeName): Promise<TypeInfo[]> => {
      return this.request(buildListTypes(type), resultsEnvelope(typeInfoSchema));
    },
  };

  templates = {
    list: async (type: ObjectTypeName, filter?: string): Promise<TemplateInfo[]> => {
      return this.request(buildListTemplates(type, filter), resultsEnvelope(templateInfoSchema));
    },
  };

  variables = {
    list: async (): Promise<VariableInfo[]> => {
      return this.request(buildListVariables(), resultsEnvelope(variableInfoSchema));
    },
  };
}

/**
 * Create a new Icinga client
 */
export function createIcingaClient(options: IcingaClientOptions = {}): IcingaClient {
  return new IcingaClient(options);
}

/**
 * Create a client from `ICINGA_API_*` environment variables, an optional
 * config file and explicit overrides
 */
export function createClientFromEnv(
  overrides: IcingaClientOptions = {},
  configFile?: string
): IcingaClient {
  const { adapter, logger, ...config } = overrides;
  return new IcingaClient({ ...loadConfig(config, { configFile }), adapter, logger });
}
