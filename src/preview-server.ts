import fs from "node:fs";
import http from "node:http";
import type { IncomingMessage, ServerResponse } from "node:http";
import { LOOPBACK_HOST } from "./config.js";
import { errorMessage } from "./errors.js";
import { streamEvents, type StreamOptions } from "./event-stream.js";
import type { FileRegistry } from "./file-registry.js";
import { logger } from "./logger.js";
import { INDEX_SCOPE, type NotificationHub, type Scope } from "./notification-hub.js";
import { contentTypeFor, resolveAssetPath } from "./static-assets.js";
import { buildFilePage, buildIndexPage } from "./templates.js";

export interface PreviewServer {
  url: string;
  port: number;
  close(): Promise<void>;
}

export interface CreatePreviewServerOptions {
  registry: FileRegistry;
  hub: NotificationHub;
  /** 0 picks a free port. */
  port: number;
  host?: string;
  stream?: StreamOptions;
}

const NO_CACHE = "no-cache, no-store, must-revalidate";

export async function createPreviewServer(
  options: CreatePreviewServerOptions,
): Promise<PreviewServer> {
  const { registry, hub } = options;
  const host = options.host ?? LOOPBACK_HOST;
  const streams = new Set<ServerResponse>();

  const server = http.createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error(`Request ${req.method ?? "GET"} ${req.url ?? ""} failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        sendText(res, 500, "Internal Server Error");
      } else if (!res.writableEnded) {
        res.end();
      }
    });
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (!req.url) {
      sendText(res, 400, "Bad request");
      return;
    }

    let requestUrl: URL;
    try {
      requestUrl = new URL(req.url, `http://${host}`);
    } catch {
      sendText(res, 400, "Bad request");
      return;
    }

    if (req.method !== "GET" && req.method !== "HEAD") {
      res.setHeader("allow", "GET, HEAD");
      sendText(res, 405, "Method not allowed");
      return;
    }

    const { pathname, searchParams } = requestUrl;
    const filePath = searchParams.get("file") ?? "";

    if (pathname === "/events") {
      if (filePath === "") {
        sendText(res, 400, "Missing file parameter");
        return;
      }
      if (!registry.has(filePath)) {
        sendText(res, 404, "File not found");
        return;
      }
      await stream(res, filePath);
      return;
    }

    if (pathname === "/events/index") {
      await stream(res, INDEX_SCOPE);
      return;
    }

    if (pathname !== "/") {
      // images in a rendered page are requested without ?file=; the page URL carries it
      const owner = filePath || fileFromReferer(req);
      if (owner === "") {
        sendText(res, 404, "Not found");
        return;
      }
      await serveAsset(res, owner, pathname);
      return;
    }

    if (filePath === "") {
      sendHtml(res, buildIndexPage(registry.list()));
      return;
    }

    const tracked = registry.get(filePath);
    if (!tracked) {
      sendText(res, 404, "Not found");
      return;
    }
    sendHtml(res, buildFilePage({ filePath: tracked.path, html: tracked.html }));
  }

  async function stream(res: ServerResponse, scope: Scope): Promise<void> {
    streams.add(res);
    try {
      await streamEvents(res, hub, scope, options.stream);
    } finally {
      streams.delete(res);
    }
  }

  async function serveAsset(
    res: ServerResponse,
    markdownFile: string,
    requestPath: string,
  ): Promise<void> {
    if (!registry.has(markdownFile)) {
      sendText(res, 404, "Not found");
      return;
    }
    const assetPath = await resolveAssetPath(markdownFile, requestPath);
    if (!assetPath) {
      sendText(res, 404, "Not found");
      return;
    }

    await new Promise<void>((resolve, reject) => {
      const source = fs.createReadStream(assetPath);
      source.once("open", () => {
        res.writeHead(200, {
          "content-type": contentTypeFor(assetPath),
          "cache-control": NO_CACHE,
        });
        source.pipe(res);
      });
      source.once("error", reject);
      res.once("close", () => {
        source.destroy();
        resolve();
      });
    });
  }

  const port: number = await new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(options.port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address && typeof address === "object") {
        resolve(address.port);
      } else {
        reject(new Error("Unable to determine server port"));
      }
    });
  });

  const shutdown = async (): Promise<void> => {
    for (const res of streams) {
      res.end();
    }
    streams.clear();
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
      // open event streams are not drained
      server.closeAllConnections();
    });
  };

  let closing: Promise<void> | undefined;
  const close = (): Promise<void> => {
    closing ??= shutdown();
    return closing;
  };

  return {
    url: `http://${host}:${port}/`,
    port,
    close,
  };
}

function fileFromReferer(req: IncomingMessage): string {
  const referer = req.headers.referer;
  if (!referer) {
    return "";
  }
  try {
    return new URL(referer).searchParams.get("file") ?? "";
  } catch {
    return "";
  }
}

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, {
    "content-type": "text/plain; charset=utf-8",
    "cache-control": NO_CACHE,
  });
  res.end(body);
}

function sendHtml(res: ServerResponse, body: string): void {
  res.writeHead(200, {
    "content-type": "text/html; charset=utf-8",
    "cache-control": NO_CACHE,
  });
  res.end(body);
}
