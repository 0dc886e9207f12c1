import { ChangeDetector, type DetectorTiming, type WatchFunction } from "./change-detector.js";
import { RELOAD_MESSAGE } from "./config.js";
import { RegistryError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { INDEX_SCOPE, type NotificationHub } from "./notification-hub.js";
import { renderFile, type Renderer } from "./renderer.js";

/** One Markdown file being served and watched. */
export interface TrackedFile {
  readonly path: string;
  /** Latest successful render. */
  html: string;
  renderedAt: Date;
  detector: ChangeDetector | undefined;
}

interface Entry {
  file: TrackedFile;
  ready: boolean;
}

export interface FileRegistryOptions {
  hub: NotificationHub;
  renderer?: Renderer;
  watch?: WatchFunction;
  timing?: Partial<DetectorTiming>;
}

/**
 * Absolute path → tracked file.
 *
 * A file is visible to `get`/`list` only once it rendered and its watch is
 * running. The entry is inserted as a placeholder before the watch starts so
 * that a change firing right away already finds it, and removed again if any
 * setup step fails.
 */
export class FileRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly inflight = new Map<string, Promise<boolean>>();
  private readonly hub: NotificationHub;
  private readonly renderer: Renderer;
  private readonly watch: WatchFunction | undefined;
  private readonly timing: Partial<DetectorTiming> | undefined;

  constructor(options: FileRegistryOptions) {
    this.hub = options.hub;
    this.renderer = options.renderer ?? renderFile;
    this.watch = options.watch;
    this.timing = options.timing;
  }

  /**
   * Starts tracking `filePath`. Resolves true when this call created the entry
   * and false when the file was already tracked.
   */
  async add(filePath: string): Promise<boolean> {
    const existing = this.entries.get(filePath);
    if (existing?.ready) {
      return false;
    }

    const pending = this.inflight.get(filePath);
    if (pending) {
      await pending;
      return false;
    }

    const setup = this.setUp(filePath);
    this.inflight.set(filePath, setup);
    try {
      return await setup;
    } finally {
      this.inflight.delete(filePath);
    }
  }

  get(filePath: string): TrackedFile | undefined {
    const entry = this.entries.get(filePath);
    return entry?.ready ? entry.file : undefined;
  }

  has(filePath: string): boolean {
    return this.get(filePath) !== undefined;
  }

  list(): string[] {
    const paths: string[] = [];
    for (const [filePath, entry] of this.entries) {
      if (entry.ready) {
        paths.push(filePath);
      }
    }
    return paths.sort();
  }

  get size(): number {
    return this.list().length;
  }

  close(): void {
    for (const { file } of this.entries.values()) {
      file.detector?.close();
    }
    this.entries.clear();
  }

  private async setUp(filePath: string): Promise<boolean> {
    const file: TrackedFile = {
      path: filePath,
      html: "",
      renderedAt: new Date(),
      detector: undefined,
    };
    const entry: Entry = { file, ready: false };
    this.entries.set(filePath, entry);

    const outcome = await this.renderer(filePath);
    if (outcome.status !== "rendered") {
      this.discard(entry);
      throw new RegistryError(`failed to render file: ${outcome.error.message}`, filePath, {
        cause: outcome.error,
      });
    }
    file.html = outcome.html;
    file.renderedAt = new Date();

    // the registry may have been closed while rendering
    if (this.entries.get(filePath) !== entry) {
      throw new RegistryError("registry closed while adding file", filePath);
    }

    try {
      file.detector = new ChangeDetector({
        filePath,
        hub: this.hub,
        renderer: this.renderer,
        watch: this.watch,
        timing: this.timing,
        onRendered: (html) => {
          file.html = html;
          file.renderedAt = new Date();
        },
      });
    } catch (error) {
      this.discard(entry);
      throw new RegistryError(`failed to start watching file: ${errorMessage(error)}`, filePath, {
        cause: error,
      });
    }

    entry.ready = true;
    logger.info(`Tracking ${filePath}`);
    this.hub.publish(INDEX_SCOPE, RELOAD_MESSAGE);
    return true;
  }

  private discard(entry: Entry): void {
    entry.file.detector?.close();
    if (this.entries.get(entry.file.path) === entry) {
      this.entries.delete(entry.file.path);
    }
  }
}
