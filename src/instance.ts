import type { DetectorTiming, WatchFunction } from "./change-detector.js";
import { fileUrl } from "./config.js";
import { ControlServer } from "./control-channel.js";
import { errorMessage } from "./errors.js";
import { FileRegistry } from "./file-registry.js";
import { logger } from "./logger.js";
import { NotificationHub } from "./notification-hub.js";
import { getSocketPath } from "./paths.js";
import { createPreviewServer, type PreviewServer } from "./preview-server.js";
import type { Renderer } from "./renderer.js";

export interface PrimaryInstanceOptions {
  /** 0 picks a free port. */
  port: number;
  socketPath?: string;
  initialFile?: string;
  renderer?: Renderer;
  watch?: WatchFunction;
  timing?: Partial<DetectorTiming>;
  keepAliveMs?: number;
}

/** The process that owns the control socket and serves every tracked file. */
export interface PrimaryInstance {
  readonly port: number;
  readonly socketPath: string;
  readonly registry: FileRegistry;
  readonly hub: NotificationHub;
  urlFor(filePath: string): string;
  /** Idempotent; resolves once everything is released. */
  close(): Promise<void>;
  /** Settles when the instance has shut down, whoever asked for it. */
  readonly closed: Promise<void>;
}

export async function startPrimary(options: PrimaryInstanceOptions): Promise<PrimaryInstance> {
  const socketPath = options.socketPath ?? getSocketPath();
  const hub = new NotificationHub();
  const registry = new FileRegistry({
    hub,
    renderer: options.renderer,
    watch: options.watch,
    timing: options.timing,
  });

  let preview: PreviewServer | undefined;
  let closing: Promise<void> | undefined;
  let markClosed: () => void = () => {};
  const closed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });

  let port = options.port;
  const urlFor = (filePath: string): string => fileUrl(port, filePath);

  const control = new ControlServer({
    socketPath,
    urlFor,
    registry,
    onStop: () => {
      close().catch((error: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(error)}`);
      });
    },
  });

  const close = (): Promise<void> => {
    closing ??= (async () => {
      logger.info("Shutting down");
      try {
        await control.close();
        registry.close();
        hub.closeAll();
        await preview?.close();
      } finally {
        markClosed();
      }
    })();
    return closing;
  };

  try {
    preview = await createPreviewServer({
      registry,
      hub,
      port: options.port,
      stream: { keepAliveMs: options.keepAliveMs },
    });
    port = preview.port;
    await control.listen();
    if (options.initialFile) {
      await registry.add(options.initialFile);
    }
  } catch (error) {
    await close();
    throw error;
  }

  logger.info(`Serving on ${preview.url}`);

  return {
    port,
    socketPath,
    registry,
    hub,
    urlFor,
    close,
    closed,
  };
}
