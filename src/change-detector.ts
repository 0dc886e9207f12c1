import fs from "node:fs";
import path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import {
  DEBOUNCE_MS,
  RELOAD_MESSAGE,
  RELOAD_RETRY_ATTEMPTS,
  RELOAD_RETRY_DELAY_MS,
} from "./config.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import type { NotificationHub } from "./notification-hub.js";
import { renderFile, type RenderOutcome, type Renderer } from "./renderer.js";

export interface FileWatcher {
  close(): void;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type WatchListener = (eventType: string, fileName: string | null) => void;
export type WatchFunction = (directory: string, listener: WatchListener) => FileWatcher;

export interface DetectorTiming {
  debounceMs: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export interface ChangeDetectorOptions {
  filePath: string;
  hub: NotificationHub;
  /** Receives every successful re-render before subscribers are notified. */
  onRendered: (html: string) => void;
  renderer?: Renderer;
  watch?: WatchFunction;
  timing?: Partial<DetectorTiming>;
}

const watchDirectory: WatchFunction = (directory, listener) =>
  fs.watch(directory, { persistent: true }, listener);

/**
 * Live-reload pipeline for one tracked file.
 *
 * Watches the parent directory rather than the file: editors that save by
 * writing a temp file and renaming it over the original replace the inode,
 * and a watch on the old inode goes silent.
 */
export class ChangeDetector {
  readonly filePath: string;
  private readonly fileName: string;
  private readonly hub: NotificationHub;
  private readonly onRendered: (html: string) => void;
  private readonly renderer: Renderer;
  private readonly timing: DetectorTiming;
  private readonly watcher: FileWatcher;

  private timer: NodeJS.Timeout | undefined;
  private reloading = false;
  private dirty = false;
  private closed = false;
  private reloads = 0;
  private lastReload: Date | undefined;

  /** Throws when the directory watch cannot be established. */
  constructor(options: ChangeDetectorOptions) {
    this.filePath = options.filePath;
    this.fileName = path.basename(options.filePath);
    this.hub = options.hub;
    this.onRendered = options.onRendered;
    this.renderer = options.renderer ?? renderFile;
    this.timing = {
      debounceMs: options.timing?.debounceMs ?? DEBOUNCE_MS,
      retryAttempts: options.timing?.retryAttempts ?? RELOAD_RETRY_ATTEMPTS,
      retryDelayMs: options.timing?.retryDelayMs ?? RELOAD_RETRY_DELAY_MS,
    };

    const watch = options.watch ?? watchDirectory;
    this.watcher = watch(path.dirname(options.filePath), this.handleEvent);
    this.watcher.on("error", (error) => {
      logger.error(`Watcher error for ${this.filePath}: ${error.message}`);
      this.close();
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get reloadCount(): number {
    return this.reloads;
  }

  get lastReloadAt(): Date | undefined {
    return this.lastReload;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.watcher.close();
  }

  private readonly handleEvent: WatchListener = (eventType, fileName) => {
    if (this.closed) {
      return;
    }
    // siblings in the same directory
    if (fileName !== null && path.basename(fileName) !== this.fileName) {
      return;
    }
    // "change" is a write, "rename" covers create, rename and atomic replace
    if (eventType !== "change" && eventType !== "rename") {
      return;
    }
    logger.debug(`File event: ${this.filePath} (${eventType})`);
    this.schedule();
  };

  private schedule(): void {
    if (this.reloading) {
      this.dirty = true;
      return;
    }
    if (this.timer) {
      return;
    }
    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.reload().catch((error: unknown) => {
        logger.error(`Reload of ${this.filePath} failed: ${errorMessage(error)}`);
      });
    }, this.timing.debounceMs);
  }

  private async reload(): Promise<void> {
    this.reloading = true;
    try {
      const outcome = await this.renderWithRetry();
      if (this.closed) {
        return;
      }
      if (outcome.status !== "rendered") {
        logger.warn(`Failed to render ${this.filePath}: ${outcome.error.message}`);
        return;
      }

      this.onRendered(outcome.html);
      this.reloads += 1;
      this.lastReload = new Date();
      const notified = this.hub.publish(this.filePath, RELOAD_MESSAGE);
      logger.info(`Reloaded ${this.filePath} (${notified} client${notified === 1 ? "" : "s"})`);
    } finally {
      this.reloading = false;
      if (this.dirty && !this.closed) {
        this.dirty = false;
        this.schedule();
      }
    }
  }

  private async renderWithRetry(): Promise<RenderOutcome> {
    for (let attempt = 1; ; attempt += 1) {
      const outcome = await this.renderer(this.filePath);
      if (
        outcome.status !== "missing" ||
        attempt >= this.timing.retryAttempts ||
        this.closed
      ) {
        return outcome;
      }
      logger.debug(
        `${this.filePath} is missing, retrying (${attempt}/${this.timing.retryAttempts})`,
      );
      await sleep(this.timing.retryDelayMs);
    }
  }
}
