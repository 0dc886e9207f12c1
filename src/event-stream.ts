import type { ServerResponse } from "node:http";
import { KEEPALIVE_MS } from "./config.js";
import type { NotificationHub, Scope } from "./notification-hub.js";

type StreamStep =
  | { kind: "message"; message: string }
  | { kind: "keepalive" }
  | { kind: "end" };

export interface StreamOptions {
  keepAliveMs?: number;
}

/**
 * Serves one Server-Sent Events connection for `scope` until the client goes
 * away or the hub closes the sink. Each iteration waits for whichever comes
 * first: a published message, the keep-alive timer, or a disconnect.
 */
export async function streamEvents(
  res: ServerResponse,
  hub: NotificationHub,
  scope: Scope,
  options: StreamOptions = {},
): Promise<void> {
  const keepAliveMs = options.keepAliveMs ?? KEEPALIVE_MS;

  res.writeHead(200, {
    "content-type": "text/event-stream",
    "cache-control": "no-cache, no-store, must-revalidate",
    connection: "keep-alive",
    "x-accel-buffering": "no",
  });
  res.flushHeaders();

  const sink = hub.subscribe(scope);
  const disconnected = new Promise<StreamStep>((resolve) => {
    const end = (): void => resolve({ kind: "end" });
    // the request's own "close" can fire once its (empty) body is read; the response's marks the disconnect
    res.once("close", end);
    res.once("error", end);
  });

  const nextMessage = (): Promise<StreamStep> =>
    sink
      .next()
      .then((value): StreamStep =>
        value === undefined ? { kind: "end" } : { kind: "message", message: value },
      );

  let keepAliveTimer: NodeJS.Timeout | undefined;
  // outlives keep-alive turns; replaced only once a message was taken
  let message = nextMessage();
  try {
    for (;;) {
      const keepAlive = new Promise<StreamStep>((resolve) => {
        keepAliveTimer = setTimeout(() => resolve({ kind: "keepalive" }), keepAliveMs);
      });

      const step = await Promise.race([message, keepAlive, disconnected]);
      clearTimeout(keepAliveTimer);
      if (step.kind === "message") {
        message = nextMessage();
      }

      if (step.kind === "end" || res.destroyed || res.writableEnded) {
        return;
      }
      const frame = step.kind === "message" ? `data: ${step.message}\n\n` : ": keepalive\n\n";
      res.write(frame);
    }
  } finally {
    clearTimeout(keepAliveTimer);
    hub.unsubscribe(scope, sink);
    if (!res.writableEnded) {
      res.end();
    }
  }
}
