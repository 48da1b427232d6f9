/**
 * jobcast CLI commands.
 *
 * Kept apart from the bin entry so the commands can run in-process with
 * injected I/O.
 */

import fs from "node:fs";
import { loadNotifyConfig, type NotifyConfig } from "../config.js";
import { describeError } from "../errors.js";
import { jobStateFromJson, parseFormat, type Format, type JobState } from "../format/index.js";
import { createNotifyLogger } from "../logger.js";
import { createNotifier, type NotifyEndpoint } from "../notifier.js";
import { parseTransportKind, validateDestination } from "../transport/index.js";
import type { TransportKind } from "../transport/types.js";
import type { NotifyLogger } from "../types.js";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  /** Whole of stdin, used when no job-state file is given. */
  readStdin: () => Promise<string>;
  env: NodeJS.ProcessEnv;
}

export interface CliDeps {
  io: CliIo;
  logger?: NotifyLogger;
  loadConfig?: () => NotifyConfig;
}

/** What the commands see: config and logger are built on first use. */
interface CommandDeps {
  io: CliIo;
  loadConfig: () => NotifyConfig;
  logger: () => NotifyLogger;
}

interface ParsedOptions {
  positional: string[];
  flags: Map<string, string>;
  noProxy: boolean;
}

const VALUE_FLAGS = new Set(["--transport", "--url", "--format", "--timeout"]);

function parseOptions(args: string[]): ParsedOptions {
  const positional: string[] = [];
  const flags = new Map<string, string>();
  let noProxy = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--no-proxy") {
      noProxy = true;
    } else if (VALUE_FLAGS.has(arg)) {
      const value = args[i + 1];
      if (value === undefined) {
        throw new Error(`Missing value for ${arg}`);
      }
      flags.set(arg, value);
      i++;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags, noProxy };
}

function requireFlag(opts: ParsedOptions, name: string): string {
  const value = opts.flags.get(name);
  if (value === undefined) {
    throw new Error(`Missing required option ${name}`);
  }
  return value;
}

function parseTimeout(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`--timeout must be a non-negative integer (ms), got '${raw}'`);
  }
  return value;
}

async function readJobState(file: string | undefined, io: CliIo): Promise<JobState> {
  const text = file !== undefined ? fs.readFileSync(file, "utf8") : await io.readStdin();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error(`Job state is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  return jobStateFromJson(raw);
}

function showHelp(io: CliIo): void {
  io.stdout(`
jobcast — deliver build/job state notifications

Usage:
  jobcast <command> [options]

Commands:
  send [job.json]            Send one notification (job state from file or stdin)
    --transport <kind>       UDP, TCP or HTTP
    --url <destination>      hostname:port, or http(s)://host:port/path
    --format <fmt>           json (default) or xml
    --timeout <ms>           Connect/read timeout (default from config, 30000)
    --no-proxy               Ignore http_proxy and configured proxies
  validate                   Check a destination without sending
    --transport <kind>
    --url <destination>
  notify [job.json]          Send to every endpoint in the loaded config
  help                       Show this help message

Config:
  $JOBCAST_CONFIG, ./jobcast.json or ~/.jobcast/jobcast.json

Examples:
  jobcast validate --transport TCP --url ci-events.internal:9000
  jobcast send --transport HTTP --url https://hooks.example.test/build job.json
  cat job.json | jobcast send --transport UDP --url 127.0.0.1:5140 --format xml
`);
}

async function cmdSend(args: string[], deps: CommandDeps): Promise<number> {
  const opts = parseOptions(args);
  const transport: TransportKind = parseTransportKind(requireFlag(opts, "--transport"));
  const url = requireFlag(opts, "--url");
  const format: Format = parseFormat(opts.flags.get("--format") ?? "json");

  // Reject bad destinations before reading any input.
  validateDestination(transport, url);

  const config = deps.loadConfig();
  const timeoutMs = parseTimeout(opts.flags.get("--timeout"), config.defaultTimeoutMs);
  const jobState = await readJobState(opts.positional[0], deps.io);

  const notifier = createNotifier({
    logger: deps.logger(),
    proxy: opts.noProxy ? null : config.proxy,
    env: deps.io.env,
    maxRedirects: config.maxRedirects,
    defaultTimeoutMs: config.defaultTimeoutMs,
  });
  const endpoint: NotifyEndpoint = { transport, format, url, timeoutMs };
  await notifier.notify(endpoint, jobState);
  return 0;
}

function cmdValidate(args: string[], deps: CommandDeps): number {
  const opts = parseOptions(args);
  const transport = parseTransportKind(requireFlag(opts, "--transport"));
  const url = requireFlag(opts, "--url");
  validateDestination(transport, url);
  deps.io.stdout(`OK: ${transport} destination accepted`);
  return 0;
}

async function cmdNotify(args: string[], deps: CommandDeps): Promise<number> {
  const opts = parseOptions(args);
  const config = deps.loadConfig();
  if (config.endpoints.length === 0) {
    deps.io.stderr("No endpoints configured.");
    return 1;
  }

  const jobState = await readJobState(opts.positional[0], deps.io);
  const notifier = createNotifier({
    logger: deps.logger(),
    proxy: opts.noProxy ? null : config.proxy,
    env: deps.io.env,
    maxRedirects: config.maxRedirects,
    defaultTimeoutMs: config.defaultTimeoutMs,
  });

  const outcomes = await notifier.notifyAll(config.endpoints, jobState);
  let failed = 0;
  for (const outcome of outcomes) {
    const detail = outcome.error ? ` (${outcome.error.message})` : "";
    deps.io.stdout(`${outcome.endpoint.transport.padEnd(4)} ${outcome.status}${detail}`);
    if (outcome.status === "failed") failed++;
  }
  return failed > 0 ? 1 : 0;
}

/** Run one CLI invocation. Resolves to the process exit code. */
export async function runCli(args: string[], deps: CliDeps): Promise<number> {
  const load = deps.loadConfig ?? loadNotifyConfig;
  let config: NotifyConfig | undefined;
  const loadConfig = (): NotifyConfig => {
    if (config === undefined) config = load();
    return config;
  };
  let logger = deps.logger;
  const getLogger = (): NotifyLogger => {
    if (logger === undefined) logger = createNotifyLogger({ level: loadConfig().logLevel });
    return logger;
  };
  const command = args[0];

  try {
    const resolved: CommandDeps = { io: deps.io, loadConfig, logger: getLogger };

    switch (command) {
      case "send":
        return await cmdSend(args.slice(1), resolved);
      case "validate":
        return cmdValidate(args.slice(1), resolved);
      case "notify":
        return await cmdNotify(args.slice(1), resolved);
      case "help":
      case "--help":
      case "-h":
      case undefined:
        showHelp(deps.io);
        return 0;
      default:
        deps.io.stderr(`Unknown command: ${command}`);
        showHelp(deps.io);
        return 1;
    }
  } catch (err) {
    deps.io.stderr(`Error: ${describeError(err)}`);
    return 1;
  }
}
