export const DEFAULT_PORT = 6333;
export const LOOPBACK_HOST = "127.0.0.1";

export const DEBOUNCE_MS = 100;
export const RELOAD_RETRY_ATTEMPTS = 10;
export const RELOAD_RETRY_DELAY_MS = 50;

export const KEEPALIVE_MS = 30_000;
export const SINK_CAPACITY = 16;

export const CONTROL_TIMEOUT_MS = 5_000;
export const DAEMON_READY_TIMEOUT_MS = 5_000;

/** Environment marker set on the detached child started by `--daemon`. */
export const DAEMON_ENV_FLAG = "LUM_DAEMON";

export const RELOAD_MESSAGE = "reload";

export function parsePort(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`invalid port '${value}': must be a number`);
  }
  const port = Number.parseInt(trimmed, 10);
  if (port < 1 || port > 65_535) {
    throw new Error(`invalid port ${port}: must be between 1 and 65535`);
  }
  return port;
}

export function fileUrl(port: number, filePath: string): string {
  return `http://${LOOPBACK_HOST}:${port}/?file=${filePath}`;
}

export function indexUrl(port: number): string {
  return `http://${LOOPBACK_HOST}:${port}/`;
}
