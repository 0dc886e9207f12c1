import { describe, expect, it } from "vitest";
import { renderMarkdown } from "../src/markdown.js";

describe("renderMarkdown", () => {
  it("renders headings", () => {
    const html = renderMarkdown("# Hello\n\nText");
    expect(html).toContain('<h1 id="hello">Hello</h1>');
    expect(html).toContain("<p>Text</p>");
  });

  it("supports GitHub Flavored Markdown features", () => {
    const markdown = String.raw`| a | b |
| - | - |
| 1 | 2 |

~~strike~~`;
    const html = renderMarkdown(markdown);
    expect(html).toContain("<table>");
    expect(html).toContain("<del>strike</del>");
  });

  it("retains table captions", () => {
    const markdown = `<table><caption>Demo</caption><thead><tr><th>A</th><th>B</th></tr></thead><tbody><tr><td>1</td><td>2</td></tr></tbody></table>`;
    const html = renderMarkdown(markdown);
    expect(html).toContain("<caption>Demo</caption>");
    expect(html).toContain("<td>2</td>");
  });

  it("renders enhanced fenced code blocks", () => {
    const html = renderMarkdown("```ts\nconst x = 1;\n```\n");
    expect(html).toContain('class="code-block code-block-typescript"');
    expect(html).toContain('class="code-copy"');
    expect(html).toContain('class="hljs language-typescript"');
  });

  it("applies diff styling to diff code fences", () => {
    const html = renderMarkdown("```diff\n+ added\n- removed\n```\n");
    expect(html).toContain("code-block-diff");
    expect(html).toMatch(/code-line-addition/);
    expect(html).toMatch(/code-line-deletion/);
  });

  it("renders emoji shortcodes in text", () => {
    const html = renderMarkdown("Hello :sparkles:");
    expect(html).toContain("Hello ✨");
  });

  it("does not emojify inside code blocks", () => {
    const html = renderMarkdown("`code :sparkles:`");
    expect(html).toContain("code :sparkles:");
  });

  it("renders alert blocks", () => {
    const markdown = "> [!TIP]\n> Remember to hydrate\n";
    const html = renderMarkdown(markdown);
    expect(html).toContain('<div class="markdown-alert markdown-alert-tip">');
    expect(html).toContain(
      '<p class="markdown-alert-title"><span class="markdown-alert-icon" aria-hidden="true">💡</span>Tip</p>',
    );
    expect(html).toContain("<p>Remember to hydrate</p>");
  });

  it("keeps text after the alert marker as the first body line", () => {
    const markdown = "> [!IMPORTANT] Read me first\n> Critical instructions\n";
    const html = renderMarkdown(markdown);
    expect(html).toContain("markdown-alert markdown-alert-important");
    expect(html).toContain("Read me first");
    expect(html).toContain("Critical instructions");
  });

  it("leaves unknown alert types as plain blockquotes", () => {
    const html = renderMarkdown("> [!FOO]\n> body\n");
    expect(html).toContain("<blockquote>");
    expect(html).not.toContain("markdown-alert");
  });

  it("leaves ordinary blockquotes alone", () => {
    const html = renderMarkdown("> quoted\n");
    expect(html).toContain("<blockquote>\n<p>quoted</p>\n</blockquote>");
  });

  it("retains details disclosures", () => {
    const markdown =
      "<details>\n<summary>Toggle</summary>\n<p>Hidden</p>\n</details>";
    const html = renderMarkdown(markdown);
    expect(html).toContain("<details>");
    expect(html).toContain("<summary>Toggle</summary>");
    expect(html).toContain("Hidden");
  });

  it("de-duplicates heading ids", () => {
    const html = renderMarkdown("# Intro\n\n# Intro\n");
    expect(html).toContain('<h1 id="intro">Intro</h1>');
    expect(html).toContain('<h1 id="intro-1">Intro</h1>');
  });

  it("leaves unlabelled fences unhighlighted", () => {
    const html = renderMarkdown("```\n<b>x</b>\n```\n");
    expect(html).toContain('class="code-block code-block-plain"');
    expect(html).toContain('<code id="code-block-1" class="hljs">');
    expect(html).toContain("&lt;b&gt;x&lt;/b&gt;");
  });

  it("numbers code blocks in document order", () => {
    const html = renderMarkdown("```js\na\n```\n\n```js\nb\n```\n");
    expect(html).toContain('data-code-target="code-block-1"');
    expect(html).toContain('data-code-target="code-block-2"');
  });
});
