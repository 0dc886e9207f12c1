import { spawn } from "node:child_process";
import fs from "node:fs";
import process from "node:process";
import { setTimeout as sleep } from "node:timers/promises";
import { DAEMON_ENV_FLAG, DAEMON_READY_TIMEOUT_MS } from "./config.js";
import { instanceExists } from "./control-channel.js";

const READY_POLL_MS = 100;

export function isDaemonChild(env: NodeJS.ProcessEnv = process.env): boolean {
  return env[DAEMON_ENV_FLAG] === "1";
}

/**
 * Re-runs the current CLI as a detached background process with its output
 * appended to `logPath`. The child sees DAEMON_ENV_FLAG and serves instead of
 * spawning again.
 */
export function spawnDaemon(args: readonly string[], logPath: string): number | undefined {
  const script = process.argv[1];
  if (!script) {
    throw new Error("Unable to determine the lum entry point");
  }

  const logFd = fs.openSync(logPath, "a");
  try {
    const child = spawn(process.execPath, [...process.execArgv, script, ...args], {
      detached: true,
      stdio: ["ignore", logFd, logFd],
      env: { ...process.env, [DAEMON_ENV_FLAG]: "1" },
    });
    // the parent exits as soon as the daemon answers on the control socket
    child.unref();
    return child.pid;
  } finally {
    fs.closeSync(logFd);
  }
}

/** Polls the control socket until an instance answers. */
export async function waitForInstance(
  socketPath: string,
  timeoutMs: number = DAEMON_READY_TIMEOUT_MS,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await instanceExists({ socketPath })) {
      return true;
    }
    await sleep(READY_POLL_MS);
  }
  return false;
}

/** Polls until nothing answers on the control socket any more. */
export async function waitForShutdown(
  socketPath: string,
  timeoutMs: number = DAEMON_READY_TIMEOUT_MS,
): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!(await instanceExists({ socketPath }))) {
      return true;
    }
    await sleep(READY_POLL_MS);
  }
  return false;
}
