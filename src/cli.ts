import { Command, CommanderError, InvalidArgumentError } from "commander";
import fs from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import process from "node:process";
import { DEFAULT_PORT, indexUrl, parsePort } from "./config.js";
import { instanceExists, probeAndAdd, stopInstance } from "./control-channel.js";
import { isDaemonChild, spawnDaemon, waitForInstance, waitForShutdown } from "./daemon.js";
import {
  InstanceRunningError,
  NoInstanceError,
  UsageError,
  errorMessage,
  hasErrorCode,
} from "./errors.js";
import { startPrimary, type PrimaryInstance } from "./instance.js";
import { enableDebug, logger, setupLogFile } from "./logger.js";
import { openInBrowser } from "./open-browser.js";
import { ensureRuntimeDir, getLogPath, getSocketPath } from "./paths.js";

const require = createRequire(import.meta.url);

export interface CliOptions {
  port: number;
  daemon?: boolean;
  stop?: boolean;
  open?: boolean;
  debug?: boolean;
}

/** Where the CLI writes; swapped out in tests. */
export interface CliIo {
  out(text: string): void;
  err(text: string): void;
}

const processIo: CliIo = {
  out: (text) => {
    process.stdout.write(text);
  },
  err: (text) => {
    process.stderr.write(text);
  },
};

export function createProgram(io: CliIo = processIo): Command {
  return new Command()
    .name("lum")
    .description("Preview Markdown files in the browser with live reload")
    .version(readVersion(), "-V, --version")
    .argument("[file]", "Markdown file to preview")
    .option("-p, --port <port>", "port to serve on", parsePortOption, DEFAULT_PORT)
    .option("-d, --daemon", "run the server in the background")
    .option("-s, --stop", "stop the running background server")
    .option("-o, --open", "open the preview in the default browser")
    .option("--debug", "enable debug logging")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text),
      writeErr: (text) => io.err(text),
    });
}

/** Runs the CLI with user arguments (no node/script prefix). Returns the exit code. */
export async function run(argv: readonly string[], io: CliIo = processIo): Promise<number> {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  if (options.debug) {
    enableDebug();
  }

  const [fileArg] = program.args;
  // the detached child of `--daemon` is started without the flag
  if (!options.stop && !fileArg && !options.daemon && !isDaemonChild()) {
    io.err(program.helpInformation());
    return 1;
  }

  try {
    return await execute(options, fileArg, io);
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}\n`);
    return 1;
  }
}

async function execute(options: CliOptions, fileArg: string | undefined, io: CliIo): Promise<number> {
  const socketPath = getSocketPath();

  if (options.stop) {
    await stopInstance({ socketPath });
    if (!(await waitForShutdown(socketPath))) {
      throw new Error("daemon did not stop in time");
    }
    io.out("lum daemon stopped\n");
    return 0;
  }

  const filePath = fileArg ? await resolveMarkdownFile(fileArg) : undefined;
  const daemonChild = isDaemonChild();

  if (!daemonChild) {
    const url = filePath ? await attach(filePath, socketPath) : undefined;
    if (url) {
      await announce(url, options, io);
      return 0;
    }
    if (options.daemon) {
      return startDaemon(options, filePath, socketPath, io);
    }
  } else {
    setupLogFile();
  }

  return serve(options, filePath, socketPath, io);
}

async function serve(
  options: CliOptions,
  filePath: string | undefined,
  socketPath: string,
  io: CliIo,
): Promise<number> {
  let instance: PrimaryInstance;
  try {
    instance = await startPrimary({ port: options.port, socketPath, initialFile: filePath });
  } catch (error) {
    // lost the race for the control socket to another invocation
    if (error instanceof InstanceRunningError && filePath) {
      await announce(await probeAndAdd(filePath, { socketPath }), options, io);
      return 0;
    }
    throw error;
  }

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}`);
    instance.close().catch((error: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(error)}`);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await announce(filePath ? instance.urlFor(filePath) : indexUrl(instance.port), options, io);
    await instance.closed;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
  return 0;
}

async function startDaemon(
  options: CliOptions,
  filePath: string | undefined,
  socketPath: string,
  io: CliIo,
): Promise<number> {
  if (!filePath && (await instanceExists({ socketPath }))) {
    io.out(`${indexUrl(options.port)}\n`);
    return 0;
  }

  await ensureRuntimeDir();
  const logPath = getLogPath();
  const args = ["--port", String(options.port)];
  if (options.debug) {
    args.push("--debug");
  }
  if (filePath) {
    args.push(filePath);
  }

  const pid = spawnDaemon(args, logPath);
  logger.debug(`Spawned daemon (pid ${pid ?? "unknown"})`);
  if (!(await waitForInstance(socketPath))) {
    throw new Error(`daemon did not start; see ${logPath}`);
  }

  const url = filePath ? await probeAndAdd(filePath, { socketPath }) : indexUrl(options.port);
  await announce(url, options, io);
  return 0;
}

async function attach(filePath: string, socketPath: string): Promise<string | undefined> {
  try {
    return await probeAndAdd(filePath, { socketPath });
  } catch (error) {
    if (error instanceof NoInstanceError) {
      logger.debug(`No running instance: ${error.message}`);
      return undefined;
    }
    throw error;
  }
}

async function announce(url: string, options: CliOptions, io: CliIo): Promise<void> {
  io.out(`${url}\n`);
  if (!options.open) {
    return;
  }
  try {
    await openInBrowser(url);
  } catch (error) {
    logger.warn(errorMessage(error));
  }
}

export async function resolveMarkdownFile(target: string): Promise<string> {
  const absolutePath = path.resolve(process.cwd(), target);
  try {
    const stat = await fs.stat(absolutePath);
    if (!stat.isFile()) {
      throw new UsageError(`Not a file: ${absolutePath}`);
    }
  } catch (error) {
    if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
      throw new UsageError(`File does not exist: ${absolutePath}`);
    }
    throw error;
  }
  return absolutePath;
}

function parsePortOption(value: string): number {
  try {
    return parsePort(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

function readVersion(): string {
  const manifest: unknown = require("../package.json");
  if (
    typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
  ) {
    return manifest.version;
  }
  return "0.0.0";
}
