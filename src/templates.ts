import path from "node:path";
import { escapeHtml } from "./markdown.js";

export interface FilePageOptions {
  filePath: string;
  html: string;
}

export function buildFilePage(options: FilePageOptions): string {
  const fileName = path.basename(options.filePath);
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${escapeHtml(fileName)}</title>
    <style>${BASE_STYLES}${DOCUMENT_STYLES}</style>
  </head>
  <body data-file="${escapeHtml(options.filePath)}">
    <header class="toolbar">
      <a href="/" class="toolbar-home">All files</a>
      <span class="toolbar-path" title="${escapeHtml(options.filePath)}">${escapeHtml(options.filePath)}</span>
      <span class="toolbar-status" id="status" hidden></span>
    </header>
    <main>
      <article class="markdown-body" id="content">
${options.html}
      </article>
    </main>
    <script type="module">${FILE_PAGE_SCRIPT}</script>
  </body>
</html>`;
}

export function buildIndexPage(filePaths: readonly string[]): string {
  const items =
    filePaths.length === 0
      ? `<p class="placeholder">No files are being tracked.</p>`
      : `<ul class="file-list">
${filePaths
  .map(
    (filePath) =>
      `        <li><a href="/?file=${encodeURIComponent(filePath)}"><span class="file-name">${escapeHtml(path.basename(filePath))}</span><span class="file-path">${escapeHtml(filePath)}</span></a></li>`,
  )
  .join("\n")}
      </ul>`;

  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>lum</title>
    <style>${BASE_STYLES}</style>
  </head>
  <body>
    <main>
      <h1>Tracked files</h1>
      ${items}
    </main>
    <script type="module">
      const events = new EventSource("/events/index");
      events.addEventListener("message", (event) => {
        if (event.data === "reload") {
          window.location.reload();
        }
      });
    </script>
  </body>
</html>`;
}

const BASE_STYLES = `
      :root {
        color-scheme: light dark;
        font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", system-ui, sans-serif;
        --bg-color: #ffffff;
        --text-color: #1f2328;
        --muted-color: #57606a;
        --code-bg: #f6f8fa;
        --border-color: #d0d7de;
        --link-color: #0969da;
      }

      @media (prefers-color-scheme: dark) {
        :root {
          --bg-color: #0d1117;
          --text-color: #e6edf3;
          --muted-color: #9ea7b3;
          --code-bg: #161b22;
          --border-color: #30363d;
          --link-color: #4493f8;
        }
      }

      body {
        margin: 0;
        background: var(--bg-color);
        color: var(--text-color);
      }

      main {
        max-width: 860px;
        margin: 0 auto;
        padding: 2.5rem 1.5rem 4rem;
        box-sizing: border-box;
      }

      a {
        color: var(--link-color);
      }

      .file-list {
        list-style: none;
        padding: 0;
      }

      .file-list li {
        border-bottom: 1px solid var(--border-color);
      }

      .file-list a {
        display: flex;
        flex-direction: column;
        padding: 0.75rem 0;
        text-decoration: none;
      }

      .file-path,
      .placeholder {
        color: var(--muted-color);
        font-size: 0.85rem;
      }
`;

const DOCUMENT_STYLES = `
      .toolbar {
        position: sticky;
        top: 0;
        display: flex;
        gap: 1rem;
        align-items: center;
        padding: 0.5rem 1.5rem;
        font-size: 0.85rem;
        background: var(--code-bg);
        border-bottom: 1px solid var(--border-color);
      }

      .toolbar-path {
        color: var(--muted-color);
        overflow: hidden;
        text-overflow: ellipsis;
        white-space: nowrap;
      }

      .toolbar-status {
        margin-left: auto;
        color: var(--muted-color);
      }

      .markdown-body {
        line-height: 1.6;
      }

      .markdown-body table {
        border-collapse: collapse;
      }

      .markdown-body th,
      .markdown-body td {
        border: 1px solid var(--border-color);
        padding: 0.4rem 0.8rem;
      }

      .markdown-body img {
        max-width: 100%;
      }

      .markdown-alert {
        border-left: 0.25rem solid var(--border-color);
        padding: 0.5rem 1rem;
        margin: 1rem 0;
      }

      .markdown-alert-title {
        font-weight: 600;
        margin: 0 0 0.25rem;
      }

      .markdown-alert-icon {
        margin-right: 0.4rem;
      }

      .markdown-alert-note { border-left-color: #0969da; }
      .markdown-alert-tip { border-left-color: #1a7f37; }
      .markdown-alert-important { border-left-color: #8250df; }
      .markdown-alert-warning { border-left-color: #9a6700; }
      .markdown-alert-caution { border-left-color: #cf222e; }

      .code-block {
        position: relative;
        margin: 1rem 0;
      }

      .code-block pre {
        background: var(--code-bg);
        border: 1px solid var(--border-color);
        border-radius: 6px;
        padding: 1rem;
        overflow-x: auto;
      }

      .code-line {
        display: block;
      }

      .code-line-addition { background: rgba(46, 160, 67, 0.15); }
      .code-line-deletion { background: rgba(248, 81, 73, 0.15); }
      .code-line-hunk { color: var(--muted-color); }

      .code-copy {
        position: absolute;
        top: 0.5rem;
        right: 0.5rem;
        font-size: 0.75rem;
      }
`;

const FILE_PAGE_SCRIPT = `
      const filePath = document.body.dataset.file ?? "";
      const content = document.getElementById("content");
      const status = document.getElementById("status");

      const enhanceCodeBlocks = (root) => {
        root.querySelectorAll(".code-copy").forEach((button) => {
          button.addEventListener("click", async () => {
            const target = document.getElementById(button.dataset.codeTarget ?? "");
            if (!target) {
              return;
            }
            await navigator.clipboard.writeText(target.innerText);
            button.textContent = "Copied";
            setTimeout(() => {
              button.textContent = "Copy";
            }, 1500);
          });
        });
      };

      const refresh = async () => {
        const response = await fetch(window.location.href, { cache: "no-store" });
        if (!response.ok) {
          status.hidden = false;
          status.textContent = "File is no longer tracked";
          return;
        }
        const page = new DOMParser().parseFromString(await response.text(), "text/html");
        const next = page.getElementById("content");
        if (next) {
          content.innerHTML = next.innerHTML;
          enhanceCodeBlocks(content);
        }
        status.hidden = true;
      };

      const events = new EventSource("/events?file=" + encodeURIComponent(filePath));

      events.addEventListener("error", () => {
        status.hidden = false;
        status.textContent = "Reconnecting…";
      });

      events.addEventListener("open", () => {
        status.hidden = true;
      });

      events.addEventListener("message", (event) => {
        if (event.data === "reload") {
          refresh().catch((error) => console.error("[lum] refresh failed", error));
        }
      });

      enhanceCodeBlocks(content);
`;
