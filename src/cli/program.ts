/**
 * CLI program
 *
 * Thin command-line surface over {@link IcingaClient}. Connection settings come
 * from global options, `ICINGA_API_*` environment variables and an optional
 * JSON config file, in that order of precedence.
 */

import { Command, CommanderError, Option } from "commander";
import pc from "picocolors";
import { createClientFromEnv, type IcingaClient, type IcingaClientOptions } from "../client.js";
import { isApiError } from "../errors.js";
import { levelForVerbosity, logger } from "../logger.js";
import { CLIENT_VERSION } from "../transport/session.js";
import {
  runAcknowledge,
  runCheckResult,
  runComment,
  runDowntime,
  runNotify,
  runRemoveAcknowledgement,
  runReschedule,
  type AcknowledgeCommandOptions,
  type CheckResultCommandOptions,
  type CommentCommandOptions,
  type DowntimeCommandOptions,
  type NotifyCommandOptions,
  type RemoveAcknowledgementCommandOptions,
  type RescheduleCommandOptions,
} from "./commands/actions.js";
import { runEvents, type EventsCommandOptions } from "./commands/events.js";
import {
  runCreateObject,
  runDeleteObject,
  runListObjects,
  runServiceState,
  runUpdateObject,
  type CreateObjectCommandOptions,
  type DeleteObjectCommandOptions,
  type ListObjectsCommandOptions,
  type UpdateObjectCommandOptions,
} from "./commands/objects.js";
import { runStatus } from "./commands/status.js";
import {
  collect,
  collectAssignment,
  increase,
  parseInteger,
  parseList,
  parseTimestamp,
} from "./options.js";
import { OUTPUT_FORMATS, printError, type OutputFormat } from "./reporter.js";

/**
 * Exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  /** The request failed or the API reported an error */
  FAILURE: 1,
  /** Invalid arguments, rejected before any request was sent */
  USAGE_ERROR: 2,
} as const;

export type GlobalOptions = {
  url?: string;
  user?: string;
  password?: string;
  cert?: string;
  key?: string;
  ca?: string;
  insecure?: boolean;
  timeout?: number;
  config?: string;
  format: OutputFormat;
  debug: number;
};

export type ClientFactory = (options: IcingaClientOptions, configFile?: string) => IcingaClient;

export interface ProgramDependencies {
  /** Build the client from the resolved connection options */
  createClient?: ClientFactory;
}

/**
 * Connection overrides taken from global options
 */
export function clientOptionsFrom(options: GlobalOptions): IcingaClientOptions {
  return {
    url: options.url,
    username: options.user,
    password: options.password,
    certificate: options.cert,
    key: options.key,
    caCertificate: options.ca,
    insecure: options.insecure,
    timeout: options.timeout,
  };
}

/**
 * Create the CLI program
 */
export function createProgram(dependencies: ProgramDependencies = {}): Command {
  const createClient = dependencies.createClient ?? createClientFromEnv;
  const program = new Command();

  program
    .name("icinga-api")
    .description("Query and control Icinga 2 through its REST API")
    .version(CLIENT_VERSION, "-v, --version", "Show version number")
    .option("--url <url>", "API base URL (default: https://localhost:5665)")
    .option("-u, --user <name>", "API user")
    .option("-p, --password <password>", "API password")
    .option("--cert <path>", "Client certificate (PEM)")
    .option("--key <path>", "Client private key (PEM)")
    .option("--ca <path>", "CA certificate used to verify the server")
    .option("--insecure", "Skip verification of the server certificate")
    .option("-t, --timeout <ms>", "Request timeout in milliseconds", parseInteger)
    .option("-c, --config <path>", "JSON config file (default: $ICINGA_API_CONFIG)")
    .addOption(
      new Option("-f, --format <format>", "Output format").choices(OUTPUT_FORMATS).default("table")
    )
    .option("-d, --debug", "Increase log verbosity (repeatable)", increase, 0)
    .exitOverride();

  program.hook("preAction", () => {
    logger.level = levelForVerbosity(program.opts<GlobalOptions>().debug);
  });

  const context = (): { client: IcingaClient; format: OutputFormat } => {
    const options = program.opts<GlobalOptions>();
    return {
      client: createClient(clientOptionsFrom(options), options.config),
      format: options.format,
    };
  };

  // ==================== Queries ====================

  program
    .command("objects")
    .description("List configuration objects of one type")
    .argument("<type>", "Object type, e.g. host, services, checkcommand")
    .argument("[name]", "Full object name, e.g. web01 or web01!ping4")
    .option("-a, --attrs <list>", "Comma separated attributes to return", parseList)
    .option("--filter <expr>", "Filter expression")
    .option("-j, --joins <list>", "Comma separated joins", parseList)
    .option("--all-joins", "Return all joined objects")
    .action(async (type: string, name: string | undefined, options: ListObjectsCommandOptions) => {
      const { client, format } = context();
      await runListObjects(client, format, type, name, options);
    });

  program
    .command("service-state")
    .description("Show the current state and output of a service")
    .argument("<host>", "Host name")
    .argument("<service>", "Service name")
    .action(async (host: string, service: string) => {
      const { client, format } = context();
      await runServiceState(client, format, host, service);
    });

  program
    .command("status")
    .description("Show status and statistics")
    .argument("[component]", "Status component, e.g. CIB or IcingaApplication")
    .action(async (component: string | undefined) => {
      const { client, format } = context();
      await runStatus(client, format, component);
    });

  // ==================== Objects ====================

  program
    .command("create")
    .description("Create an object")
    .argument("<type>", "Object type")
    .argument("<name>", "Object name; services as host!service")
    .option("--template <name>", "Template to import (repeatable)", collect)
    .option("--attr <key=value>", "Attribute, JSON values allowed (repeatable)", collectAssignment)
    .option("--var <key=value>", "Custom variable (repeatable)", collectAssignment)
    .action(async (type: string, name: string, options: CreateObjectCommandOptions) => {
      const { client, format } = context();
      await runCreateObject(client, format, type, name, options);
    });

  program
    .command("update")
    .description("Modify attributes of an object")
    .argument("<type>", "Object type")
    .argument("<name>", "Object name")
    .option("--attr <key=value>", "Attribute, JSON values allowed (repeatable)", collectAssignment)
    .option("--var <key=value>", "Custom variable (repeatable)", collectAssignment)
    .action(async (type: string, name: string, options: UpdateObjectCommandOptions) => {
      const { client, format } = context();
      await runUpdateObject(client, format, type, name, options);
    });

  program
    .command("delete")
    .description("Delete an object by name or all objects matching a filter")
    .argument("<type>", "Object type")
    .argument("[name]", "Object name")
    .option("--filter <expr>", "Filter expression")
    .option("--no-cascade", "Keep dependent objects")
    .action(async (type: string, name: string | undefined, options: DeleteObjectCommandOptions) => {
      const { client, format } = context();
      await runDeleteObject(client, format, type, name, options);
    });

  // ==================== Actions ====================

  const targeted = (command: Command): Command =>
    command
      .option("-H, --host <name>", "Host name")
      .option("-s, --service <name>", "Service name");

  targeted(program.command("check-result"))
    .description("Submit a passive check result")
    .requiredOption("-e, --exit-status <state>", "0-3 or a state name such as critical")
    .requiredOption("-o, --output <text>", "Plugin output")
    .option("--perfdata <value>", "Performance data value (repeatable)", collect)
    .option("--check-source <name>", "Check source")
    .option("--ttl <seconds>", "Seconds until the next result is expected", parseInteger)
    .action(async (options: CheckResultCommandOptions) => {
      const { client, format } = context();
      await runCheckResult(client, format, options);
    });

  targeted(program.command("notify"))
    .description("Send a custom notification")
    .requiredOption("--author <name>", "Author")
    .requiredOption("--comment <text>", "Notification text")
    .option("--force", "Ignore downtimes and notification settings")
    .action(async (options: NotifyCommandOptions) => {
      const { client, format } = context();
      await runNotify(client, format, options);
    });

  targeted(program.command("ack"))
    .description("Acknowledge a problem")
    .requiredOption("--author <name>", "Author")
    .requiredOption("--comment <text>", "Comment")
    .option("--expiry <time>", "Remove the acknowledgement at this time", parseTimestamp)
    .option("--sticky", "Keep until the object fully recovers")
    .option("--notify", "Notify contacts")
    .option("--persistent", "Keep the comment after removal")
    .action(async (options: AcknowledgeCommandOptions) => {
      const { client, format } = context();
      await runAcknowledge(client, format, options);
    });

  targeted(program.command("remove-ack"))
    .description("Remove an acknowledgement")
    .option("--author <name>", "Author")
    .action(async (options: RemoveAcknowledgementCommandOptions) => {
      const { client, format } = context();
      await runRemoveAcknowledgement(client, format, options);
    });

  targeted(program.command("comment"))
    .description("Add a comment")
    .requiredOption("--author <name>", "Author")
    .requiredOption("--comment <text>", "Comment")
    .option("--expiry <time>", "Remove the comment at this time", parseTimestamp)
    .action(async (options: CommentCommandOptions) => {
      const { client, format } = context();
      await runComment(client, format, options);
    });

  targeted(program.command("downtime"))
    .description("Schedule a downtime")
    .requiredOption("--author <name>", "Author")
    .requiredOption("--comment <text>", "Comment")
    .requiredOption("--start <time>", "Start, epoch seconds or ISO 8601", parseTimestamp)
    .requiredOption("--end <time>", "End, epoch seconds or ISO 8601", parseTimestamp)
    .option("--flexible", "Flexible downtime; requires --duration")
    .option("--duration <seconds>", "Duration of a flexible downtime", parseInteger)
    .option("--all-services", "Include all services of the host")
    .action(async (options: DowntimeCommandOptions) => {
      const { client, format } = context();
      await runDowntime(client, format, options);
    });

  targeted(program.command("reschedule"))
    .description("Reschedule the next check")
    .option("--next-check <time>", "Time of the next check", parseTimestamp)
    .action(async (options: RescheduleCommandOptions) => {
      const { client, format } = context();
      await runReschedule(client, format, options);
    });

  // ==================== Events ====================

  program
    .command("events")
    .description("Subscribe to the event stream")
    .requiredOption("--type <type>", "Event type, e.g. CheckResult (repeatable)", collect)
    .requiredOption("-q, --queue <name>", "Queue name")
    .option("--filter <expr>", "Filter expression")
    .option("-n, --limit <count>", "Stop after this many events", parseInteger)
    .action(async (options: EventsCommandOptions) => {
      const { client, format } = context();
      await runEvents(client, format, options);
    });

  return program;
}

/**
 * Run the CLI and return the process exit code
 */
export async function runCli(
  argv: string[],
  dependencies: ProgramDependencies = {}
): Promise<number> {
  const program = createProgram(dependencies);

  try {
    await program.parseAsync(argv, { from: "user" });
    return EXIT_CODES.SUCCESS;
  } catch (error) {
    if (error instanceof CommanderError) {
      // help and version exit with 0; commander has printed the message
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
    }
    if (isApiError(error)) {
      printError(error.message);
      // local validation carries no HTTP status
      return error.kind === "validation" && error.status === undefined
        ? EXIT_CODES.USAGE_ERROR
        : EXIT_CODES.FAILURE;
    }
    if (error instanceof Error) {
      printError(error.message);
      if (process.env.DEBUG) {
        console.error(pc.dim(error.stack));
      }
    } else {
      printError("An unexpected error occurred");
    }
    return EXIT_CODES.FAILURE;
  }
}
