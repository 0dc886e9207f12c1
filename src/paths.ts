/**
 * Runtime file locations.
 *
 * The control socket and the daemon log live in a per-user runtime directory:
 * - `$XDG_RUNTIME_DIR/lum` when the variable is set (Linux sessions)
 * - `<os tmpdir>/lum-<uid>` otherwise
 */

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import process from "node:process";

const APP_DIR_NAME = "lum";
const SOCKET_FILE_NAME = "control.sock";
const LOG_FILE_NAME = "lum.log";

export function getRuntimeDir(env: NodeJS.ProcessEnv = process.env): string {
  const xdgRuntimeDir = env.XDG_RUNTIME_DIR;
  if (xdgRuntimeDir) {
    return path.join(xdgRuntimeDir, APP_DIR_NAME);
  }
  return path.join(os.tmpdir(), `${APP_DIR_NAME}-${currentUid()}`);
}

export function getSocketPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getRuntimeDir(env), SOCKET_FILE_NAME);
}

export function getLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getRuntimeDir(env), LOG_FILE_NAME);
}

export async function ensureRuntimeDir(
  env: NodeJS.ProcessEnv = process.env,
): Promise<string> {
  const dir = getRuntimeDir(env);
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  return dir;
}

function currentUid(): number {
  // Windows has no getuid
  return typeof process.getuid === "function" ? process.getuid() : 0;
}
