import { parseArgs } from "node:util";
import { BiprwsClient } from "./services/biprws/BiprwsClient.js";
import { ConfigurationError } from "./services/biprws/errors.js";
import type { ScanClient } from "./tools/biprws/toolRegistration.js";
import {
  ConnectionStringParams,
  connectionParamsFromEnv,
  parseConnectionString,
  validateConnectionParams,
} from "./utils/connectionStringParser.js";
import { logger, LogLevel, LogMode, parseLogLevel } from "./utils/logger.js";
import {
  formatMatches,
  isOutputFormat,
  OutputFormat,
} from "./utils/matchFormatter.js";

export const HELP_TEXT = `
Webi Object Finder - find business objects used by Web Intelligence reports

USAGE:
  webi-object-finder [OPTIONS]

MODES:

  1. CLI Mode (Default):
     webi-object-finder -c "<connection string>" --folder 123456 --object Revenue

     Logs on, inspects every Webi report directly inside the folder (or the
     single report given with --report), prints the matches and logs off.

  2. STDIO Mode (MCP server):
     webi-object-finder --mode stdio -c "<connection string>"

     Runs a Model Context Protocol server over stdio exposing the
     find_objects_in_folder and find_objects_in_report tools.

OPTIONS:
  -c, --connection-string <string>  Url=<biprws url>;Username=<user>;Password=<password>;Auth=<secWinAD|secEnterprise|...>;Timeout=<seconds>
  -f, --folder <id>                 InfoStore id of the folder to scan
  -r, --report <id>                 Id of a single Web Intelligence document to scan
  -o, --object <name>               Object name to look for (repeatable)
      --objects <a,b,c>             Comma-separated object names
      --format <json|csv>           Output format (default: json)
      --concurrency <n>             Reports inspected at once (default: 1)
      --continue-on-error           Record failing reports and keep scanning
      --log-level <level>           debug, info, warn or error (default: info)
  -m, --mode <cli|stdio>            Run a scan (default) or start the MCP server
  -h, --help                        Show this help message

ENVIRONMENT VARIABLES (when no connection string is given):
  BIPRWS_CONNECTION_STRING          Full connection string
  BIPRWS_URL                        Service root, e.g. http://bi.example.com:6405/biprws
  BIPRWS_USERNAME                   User name
  BIPRWS_PASSWORD                   Password
  BIPRWS_AUTH                       Authentication type (default: secWinAD)
  BIPRWS_TIMEOUT                    Request timeout in seconds

EXIT CODES:
  0  scan completed
  1  invalid options or scan failed
  2  scan completed but some reports could not be inspected
`;

export type ScanTarget =
  | { kind: "folder"; id: string }
  | { kind: "report"; id: string };

export interface CliOptions {
  mode: "cli" | "stdio";
  connection: ConnectionStringParams;
  target?: ScanTarget;
  objectNames: string[];
  format: OutputFormat;
  concurrency: number;
  continueOnError: boolean;
  logLevel?: LogLevel;
}

export type ParsedCommand =
  | { kind: "help" }
  | { kind: "run"; options: CliOptions };

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_PARTIAL = 2;

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        "connection-string": { type: "string", short: "c" },
        folder: { type: "string", short: "f" },
        report: { type: "string", short: "r" },
        object: { type: "string", short: "o", multiple: true },
        objects: { type: "string" },
        format: { type: "string" },
        concurrency: { type: "string" },
        "continue-on-error": { type: "boolean" },
        "log-level": { type: "string" },
        mode: { type: "string", short: "m" },
        help: { type: "boolean", short: "h" },
      },
      allowPositionals: false,
    }).values;
  } catch (error) {
    throw new ConfigurationError(
      `Error parsing arguments: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }
}

/**
 * Turn command-line arguments and environment variables into options.
 *
 * @throws ConfigurationError for anything missing or invalid
 */
export function parseCommandLine(
  args: string[],
  env: NodeJS.ProcessEnv
): ParsedCommand {
  const values = readArgs(args);

  if (values.help) {
    return { kind: "help" };
  }

  const mode = values.mode ?? "cli";
  if (mode !== "cli" && mode !== "stdio") {
    throw new ConfigurationError(
      `Invalid mode '${mode}'. Valid modes are: cli, stdio`
    );
  }

  const connectionString = values["connection-string"];
  const connection = connectionString
    ? parseConnectionString(connectionString)
    : connectionParamsFromEnv(env);
  if (!connection) {
    throw new ConfigurationError(
      "A connection string (--connection-string or BIPRWS_CONNECTION_STRING) or BIPRWS_URL is required"
    );
  }
  validateConnectionParams(connection);

  let logLevel: LogLevel | undefined;
  if (values["log-level"] !== undefined) {
    logLevel = parseLogLevel(values["log-level"]);
    if (logLevel === undefined) {
      throw new ConfigurationError(
        `Invalid log level '${values["log-level"]}'. Valid levels are: debug, info, warn, error`
      );
    }
  }

  const format = values.format ?? "json";
  if (!isOutputFormat(format)) {
    throw new ConfigurationError(
      `Invalid format '${format}'. Valid formats are: json, csv`
    );
  }

  const concurrency =
    values.concurrency === undefined ? 1 : Number(values.concurrency);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError(
      `Invalid concurrency '${values.concurrency}'. Expected a positive integer`
    );
  }

  const objectNames = [
    ...(values.object ?? []),
    ...(values.objects ?? "")
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name !== ""),
  ];

  let target: ScanTarget | undefined;
  if (values.folder !== undefined && values.report !== undefined) {
    throw new ConfigurationError("Use either --folder or --report, not both");
  } else if (values.folder !== undefined) {
    target = { kind: "folder", id: values.folder };
  } else if (values.report !== undefined) {
    target = { kind: "report", id: values.report };
  }

  if (mode === "cli") {
    if (!target) {
      throw new ConfigurationError("--folder or --report is required");
    }
    if (objectNames.length === 0) {
      throw new ConfigurationError(
        "At least one object name is required (--object or --objects)"
      );
    }
  }

  return {
    kind: "run",
    options: {
      mode,
      connection,
      target,
      objectNames,
      format,
      concurrency,
      continueOnError: values["continue-on-error"] === true,
      logLevel,
    },
  };
}

/**
 * Run one scan and write the formatted matches. Returns the exit code.
 */
export async function runScan(
  options: CliOptions,
  client: ScanClient,
  write: (text: string) => void
): Promise<number> {
  const { target } = options;
  if (!target) {
    throw new ConfigurationError("--folder or --report is required");
  }

  if (target.kind === "report") {
    const matches = await client.findObjectsInReport(
      target.id,
      options.objectNames
    );
    write(formatMatches(matches, options.format));
    return EXIT_OK;
  }

  const result = await client.findObjectsInFolder(
    target.id,
    options.objectNames,
    {
      concurrency: options.concurrency,
      continueOnError: options.continueOnError,
    }
  );
  write(formatMatches(result.matches, options.format));

  logger.info(
    `Inspected ${result.reportsInspected} report(s), found ${result.matches.length} match(es)`
  );
  for (const failure of result.failures) {
    logger.warn(
      `Report ${failure.reportId}${failure.reportName ? ` '${failure.reportName}'` : ""} skipped: ${failure.error.name}: ${failure.error.message}`
    );
  }
  return result.failures.length > 0 ? EXIT_PARTIAL : EXIT_OK;
}

export async function main(
  args: string[],
  env: NodeJS.ProcessEnv
): Promise<number> {
  // stdout carries the results; logs go to stderr
  logger.setMode(LogMode.STDIO);

  let command: ParsedCommand;
  try {
    command = parseCommandLine(args, env);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.error("Use --help for usage information");
    return EXIT_ERROR;
  }

  if (command.kind === "help") {
    console.log(HELP_TEXT);
    return EXIT_OK;
  }

  const { options } = command;
  if (options.logLevel !== undefined) {
    logger.setLogLevel(options.logLevel);
  }

  if (options.mode === "stdio") {
    const { startStdioServer } = await import("./server.stdio.js");
    await startStdioServer(options.connection);
    return EXIT_OK;
  }

  try {
    return await runScan(
      options,
      new BiprwsClient(options.connection),
      (text) => console.log(text)
    );
  } catch (error) {
    logger.exception("Scan failed", error, {
      component: "cli",
      operation: "runScan",
    });
    return EXIT_ERROR;
  }
}
