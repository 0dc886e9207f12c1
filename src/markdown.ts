import hljs from "highlight.js";
import { marked } from "marked";
import { emojify } from "node-emoji";
import { parseAlert } from "./alerts.js";

const PLAIN_LANGUAGE = "plaintext";
const DIFF_LANGUAGES = new Set(["diff"]);

const LANGUAGE_ALIASES: Record<string, string> = {
  console: "bash",
  shell: "bash",
  sh: "bash",
  shellsession: "bash",
  zsh: "bash",
  text: PLAIN_LANGUAGE,
  plain: PLAIN_LANGUAGE,
  plaintext: PLAIN_LANGUAGE,
  txt: PLAIN_LANGUAGE,
  js: "javascript",
  mjs: "javascript",
  cjs: "javascript",
  ts: "typescript",
  golang: "go",
  py: "python",
  rb: "ruby",
  rs: "rust",
  yml: "yaml",
  md: "markdown",
  "c#": "csharp",
  docker: "dockerfile",
};

marked.setOptions({
  gfm: true,
  breaks: false,
});

/**
 * Converts Markdown to an HTML fragment. Raw HTML in the source is kept:
 * the input is always a file the user chose to preview.
 */
export function renderMarkdown(markdown: string): string {
  const renderer = new marked.Renderer();
  const slugCounts = new Map<string, number>();
  let codeBlockId = 0;

  renderer.heading = ({ tokens, depth, text }) => {
    const slug = createSlug(text, slugCounts);
    const content = renderer.parser.parseInline(tokens);
    return `<h${depth} id="${slug}">${content}</h${depth}>\n`;
  };

  const originalBlockquote = renderer.blockquote.bind(renderer);
  renderer.blockquote = (token) => {
    const alert = parseAlert(token);
    if (!alert) {
      return originalBlockquote(token);
    }

    const bodyHtml = renderer.parser.parse(alert.bodyTokens);
    return `<div class="markdown-alert markdown-alert-${alert.type}">
<p class="markdown-alert-title"><span class="markdown-alert-icon" aria-hidden="true">${alert.icon}</span>${alert.label}</p>
${bodyHtml}</div>
`;
  };

  const originalText = renderer.text.bind(renderer);
  renderer.text = (token) => emojify(originalText(token));

  renderer.code = ({ text, lang }) => {
    const language =
      typeof lang === "string" && lang.trim().length > 0
        ? normalizeLanguage(lang.trim().split(/\s+/)[0] ?? "")
        : undefined;

    codeBlockId += 1;
    const blockId = `code-block-${codeBlockId}`;

    const source = normalizeNewlines(text);
    const highlighted = highlightCode(source, language);
    const finalLanguage = highlighted.language;
    const languageClass = finalLanguage ? ` language-${finalLanguage}` : "";
    const blockClass = finalLanguage ? `code-block-${finalLanguage}` : "code-block-plain";
    const languageAttribute = finalLanguage
      ? ` data-language="${escapeHtml(finalLanguage)}"`
      : "";

    return `<div class="code-block ${blockClass}"${languageAttribute}>
  <button type="button" class="code-copy" data-code-target="${blockId}" aria-label="Copy">Copy</button>
  <pre><code id="${blockId}" class="hljs${languageClass}">${wrapCodeLines(highlighted.value, source, finalLanguage)}</code></pre>
</div>
`;
  };

  return marked.parse(markdown, { async: false, renderer }) as string;
}

function createSlug(source: string, counts: Map<string, number>): string {
  const base = String(source)
    .toLowerCase()
    .trim()
    .replace(/\s+/g, "-")
    .replace(/[^a-z0-9-_]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "");

  const fallback = base || "section";
  const seen = counts.get(fallback) ?? 0;
  counts.set(fallback, seen + 1);
  return seen === 0 ? fallback : `${fallback}-${seen}`;
}

function highlightCode(
  code: string,
  language?: string,
): { value: string; language?: string } {
  if (!language) {
    // Unlabelled fences stay plain; auto-detection guesses badly on short snippets.
    return { value: escapeHtml(code) };
  }
  if (language === PLAIN_LANGUAGE || !hljs.getLanguage(language)) {
    return { value: escapeHtml(code), language };
  }

  try {
    return { value: hljs.highlight(code, { language }).value, language };
  } catch {
    return { value: escapeHtml(code), language };
  }
}

function wrapCodeLines(highlighted: string, raw: string, language?: string): string {
  const rawLines = toLines(raw);
  const highlightedLines = toLines(highlighted);

  if (rawLines.length === 0) {
    return '<span class="code-line code-line-empty">&nbsp;</span>';
  }

  return rawLines
    .map((rawLine, index) => {
      const line = highlightedLines[index] ?? escapeHtml(rawLine);
      const classes = ["code-line"];
      if (rawLine.length === 0) {
        classes.push("code-line-empty");
      }
      if (isDiffLanguage(language)) {
        const marker = DIFF_MARKERS[rawLine.charAt(0)];
        if (marker) {
          classes.push(marker);
        }
      }
      return `<span class="${classes.join(" ")}">${line.length > 0 ? line : "&nbsp;"}</span>`;
    })
    .join("");
}

const DIFF_MARKERS: Record<string, string> = {
  "+": "code-line-addition",
  "-": "code-line-deletion",
  "@": "code-line-hunk",
};

function toLines(source: string): string[] {
  const segments = normalizeNewlines(source).split("\n");
  while (segments.length > 0 && segments.at(-1) === "") {
    segments.pop();
  }
  return segments;
}

function normalizeNewlines(value: string): string {
  return value.replace(/\r\n/g, "\n");
}

function normalizeLanguage(language: string): string {
  const lower = language.toLowerCase();
  return LANGUAGE_ALIASES[lower] ?? lower;
}

function isDiffLanguage(language?: string): boolean {
  return language ? DIFF_LANGUAGES.has(language) : false;
}

export function escapeHtml(source: string): string {
  return source
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}
