/**
 * Control channel between `lum` invocations.
 *
 * The primary instance listens on a Unix domain socket in the per-user
 * runtime directory. Each connection carries exactly one command line and
 * one response line:
 *
 *   ADD /abs/path.md   ->  OK http://127.0.0.1:6333/?file=/abs/path.md
 *                          ERROR file does not exist: /abs/path.md
 *   STOP               ->  OK stopping   (then the instance shuts down)
 *
 * Paths are sent verbatim; a path containing a newline cannot be expressed.
 */

import fs from "node:fs/promises";
import net from "node:net";
import path from "node:path";
import { CONTROL_TIMEOUT_MS } from "./config.js";
import {
  ControlResponseError,
  InstanceRunningError,
  NoInstanceError,
  ProtocolError,
  errorMessage,
  hasErrorCode,
} from "./errors.js";
import type { FileRegistry } from "./file-registry.js";
import { logger } from "./logger.js";
import { getSocketPath } from "./paths.js";

export const INVALID_COMMAND = "invalid command: expected 'ADD <path>' or 'STOP'";
export const INVALID_ADD_COMMAND = "invalid command: expected 'ADD <path>'";

const MAX_LINE_LENGTH = 64 * 1024;

export type ControlCommand =
  | { kind: "add"; path: string }
  | { kind: "stop" }
  | { kind: "invalid"; reason: string };

export type ControlResponse = { ok: true; value: string } | { ok: false; reason: string };

export function parseCommand(line: string): ControlCommand {
  const trimmed = line.trim();
  if (trimmed === "STOP") {
    return { kind: "stop" };
  }

  const separator = trimmed.indexOf(" ");
  const keyword = separator === -1 ? trimmed : trimmed.slice(0, separator);
  if (keyword !== "ADD") {
    return { kind: "invalid", reason: INVALID_COMMAND };
  }

  const argument = separator === -1 ? "" : trimmed.slice(separator + 1);
  if (argument === "") {
    return { kind: "invalid", reason: INVALID_ADD_COMMAND };
  }
  return { kind: "add", path: argument };
}

export function formatCommand(command: Exclude<ControlCommand, { kind: "invalid" }>): string {
  return command.kind === "add" ? `ADD ${command.path}\n` : "STOP\n";
}

export function formatResponse(response: ControlResponse): string {
  return response.ok ? `OK ${response.value}\n` : `ERROR ${response.reason}\n`;
}

export function parseResponse(line: string): ControlResponse {
  const trimmed = line.trim();
  if (trimmed.startsWith("OK ")) {
    return { ok: true, value: trimmed.slice("OK ".length) };
  }
  if (trimmed.startsWith("ERROR ")) {
    return { ok: false, reason: trimmed.slice("ERROR ".length) };
  }
  throw new ProtocolError(`unexpected response: ${trimmed}`);
}

/** Reads up to the first newline. Rejects on early close, overlong input or silence. */
export function readLine(socket: net.Socket, timeoutMs: number = CONTROL_TIMEOUT_MS): Promise<string> {
  return new Promise((resolve, reject) => {
    let buffered = "";

    const finish = (outcome: () => void): void => {
      clearTimeout(timer);
      socket.off("data", onData);
      socket.off("end", onEnd);
      socket.off("error", onError);
      outcome();
    };
    const onData = (chunk: Buffer | string): void => {
      buffered += typeof chunk === "string" ? chunk : chunk.toString("utf8");
      const newline = buffered.indexOf("\n");
      if (newline !== -1) {
        finish(() => resolve(buffered.slice(0, newline)));
      } else if (buffered.length > MAX_LINE_LENGTH) {
        finish(() => reject(new ProtocolError("line too long")));
      }
    };
    const onEnd = (): void => {
      finish(() => reject(new ProtocolError("connection closed before a full line was received")));
    };
    const onError = (error: Error): void => {
      finish(() => reject(error));
    };
    const timer = setTimeout(() => {
      finish(() => reject(new ProtocolError(`no line received within ${timeoutMs}ms`)));
    }, timeoutMs);

    socket.setEncoding("utf8");
    socket.on("data", onData);
    socket.once("end", onEnd);
    socket.once("error", onError);
  });
}

export interface ControlServerOptions {
  socketPath: string;
  /** URL handed back to clients for a tracked file. */
  urlFor: (filePath: string) => string;
  registry: FileRegistry;
  onStop: () => void;
}

export class ControlServer {
  private server: net.Server | undefined;
  private closing: Promise<void> | undefined;

  constructor(private readonly options: ControlServerOptions) {}

  get socketPath(): string {
    return this.options.socketPath;
  }

  /**
   * Binds the socket. A leftover socket file is probed first: if something
   * answers, another instance owns it; if not, it is stale and removed. A
   * process racing us between the removal and the bind makes `listen` fail
   * with EADDRINUSE, reported as InstanceRunningError.
   */
  async listen(): Promise<void> {
    const { socketPath } = this.options;
    await fs.mkdir(path.dirname(socketPath), { recursive: true, mode: 0o700 });

    if (await pathExists(socketPath)) {
      if (await canConnect(socketPath)) {
        throw new InstanceRunningError(socketPath);
      }
      await fs.rm(socketPath, { force: true });
      logger.info(`Removed stale control socket ${socketPath}`);
    }

    const server = net.createServer((socket) => {
      this.handleConnection(socket).catch((error: unknown) => {
        logger.error(`Control connection failed: ${errorMessage(error)}`);
        socket.destroy();
      });
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(
          hasErrorCode(error, "EADDRINUSE")
            ? new InstanceRunningError(socketPath, { cause: error })
            : error,
        );
      };
      server.once("error", onError);
      server.listen(socketPath, () => {
        server.off("error", onError);
        resolve();
      });
    });
    server.on("error", (error) => {
      logger.error(`Control socket error: ${error.message}`);
    });

    this.server = server;
    logger.info(`Control socket listening at ${socketPath}`);
  }

  /** Stops accepting commands and removes the socket file. */
  close(): Promise<void> {
    this.closing ??= this.shutdown();
    return this.closing;
  }

  private async shutdown(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve) => {
      server.close((error) => {
        if (error) {
          logger.warn(`Failed to close control socket: ${error.message}`);
        }
        resolve();
      });
    });
    await fs.rm(this.options.socketPath, { force: true });
  }

  private async handleConnection(socket: net.Socket): Promise<void> {
    socket.on("error", (error) => {
      logger.debug(`Control connection error: ${error.message}`);
    });

    let line: string;
    try {
      line = await readLine(socket);
    } catch (error) {
      // probes connect and hang up without sending anything
      logger.debug(`Failed to read from control socket: ${errorMessage(error)}`);
      socket.destroy();
      return;
    }

    const command = parseCommand(line);
    switch (command.kind) {
      case "invalid":
        logger.warn(`Invalid control command: ${JSON.stringify(line)}`);
        socket.end(formatResponse({ ok: false, reason: command.reason }));
        return;
      case "stop":
        logger.info("Stop requested via control socket");
        socket.end(formatResponse({ ok: true, value: "stopping" }));
        this.options.onStop();
        return;
      case "add":
        socket.end(formatResponse(await this.add(command.path)));
        return;
    }
  }

  private async add(requestedPath: string): Promise<ControlResponse> {
    const filePath = path.resolve(requestedPath);
    let exists: boolean;
    try {
      exists = await pathExists(filePath);
    } catch (error) {
      return { ok: false, reason: `failed to add file: ${errorMessage(error)}` };
    }
    if (!exists) {
      return { ok: false, reason: `file does not exist: ${requestedPath}` };
    }

    try {
      await this.options.registry.add(filePath);
    } catch (error) {
      logger.warn(`Failed to add ${filePath}: ${errorMessage(error)}`);
      return { ok: false, reason: `failed to add file: ${errorMessage(error)}` };
    }

    logger.info(`Added file via control socket: ${filePath}`);
    return { ok: true, value: this.options.urlFor(filePath) };
  }
}

export interface ControlClientOptions {
  socketPath?: string;
  timeoutMs?: number;
}

/**
 * Asks a running primary instance to track `filePath` and returns the URL it
 * serves the file at. Rejects with NoInstanceError when no instance answers,
 * which tells the caller to become the primary instance itself.
 */
export async function probeAndAdd(
  filePath: string,
  options: ControlClientOptions = {},
): Promise<string> {
  const socketPath = options.socketPath ?? getSocketPath();
  if (!(await pathExists(socketPath))) {
    throw new NoInstanceError("no existing server (socket does not exist)");
  }

  const socket = await connect(socketPath).catch((error: unknown) => {
    throw new NoInstanceError(`failed to connect to existing server: ${errorMessage(error)}`, {
      cause: error,
    });
  });

  try {
    socket.write(formatCommand({ kind: "add", path: filePath }));
    const response = parseResponse(await readLine(socket, options.timeoutMs));
    if (!response.ok) {
      throw new ControlResponseError(response.reason);
    }
    return response.value;
  } finally {
    socket.destroy();
  }
}

/** Sends STOP and waits for the instance to hang up. */
export async function stopInstance(options: ControlClientOptions = {}): Promise<void> {
  const socketPath = options.socketPath ?? getSocketPath();
  if (!(await pathExists(socketPath))) {
    throw new NoInstanceError("no daemon running");
  }
  const socket = await connect(socketPath).catch((error: unknown) => {
    throw new NoInstanceError("no daemon running", { cause: error });
  });

  try {
    socket.write(formatCommand({ kind: "stop" }));
    const line = await readLine(socket, options.timeoutMs);
    const response = parseResponse(line);
    if (!response.ok) {
      throw new ControlResponseError(response.reason);
    }
  } finally {
    socket.destroy();
  }
}

export async function instanceExists(options: ControlClientOptions = {}): Promise<boolean> {
  const socketPath = options.socketPath ?? getSocketPath();
  return (await pathExists(socketPath)) && (await canConnect(socketPath));
}

function connect(socketPath: string): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection(socketPath);
    socket.once("connect", () => {
      socket.off("error", reject);
      resolve(socket);
    });
    socket.once("error", reject);
  });
}

async function canConnect(socketPath: string): Promise<boolean> {
  try {
    const socket = await connect(socketPath);
    socket.destroy();
    return true;
  } catch {
    return false;
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
      return false;
    }
    throw error;
  }
}
