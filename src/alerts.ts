import type { Tokens, TokensList } from "marked";
import { marked } from "marked";

export type AlertType = "note" | "tip" | "important" | "warning" | "caution";

interface AlertVariant {
  label: string;
  icon: string;
}

export interface AlertMatch {
  type: AlertType;
  label: string;
  icon: string;
  bodyTokens: TokensList;
}

const ALERT_VARIANTS: Record<AlertType, AlertVariant> = {
  note: { label: "Note", icon: "ℹ️" },
  tip: { label: "Tip", icon: "💡" },
  important: { label: "Important", icon: "❗" },
  warning: { label: "Warning", icon: "⚠️" },
  caution: { label: "Caution", icon: "🛑" },
};

const ALERT_MARKER = /^\[!(\w+)\](?:\s+(.*))?$/;

/**
 * Recognizes GitHub alert blockquotes (`> [!NOTE]`). Returns undefined for
 * ordinary blockquotes and for unknown alert types, which render unchanged.
 */
export function parseAlert(token: Tokens.Blockquote): AlertMatch | undefined {
  if (!token.raw) {
    return undefined;
  }

  const lines = token.raw.split(/\n/).map((line) => line.replace(/^ {0,3}> ?/, ""));
  const [firstLine, ...rest] = lines;
  const match = firstLine?.trim().match(ALERT_MARKER);
  if (!match) {
    return undefined;
  }

  const [, rawType, trailing] = match;
  const type = rawType?.toLowerCase();
  if (!type || !isAlertType(type)) {
    return undefined;
  }

  const bodyLines = trailing ? [trailing, ...rest] : rest;
  const body = bodyLines.join("\n").trim();
  const variant = ALERT_VARIANTS[type];

  return {
    type,
    label: variant.label,
    icon: variant.icon,
    bodyTokens: marked.lexer(body),
  };
}

function isAlertType(value: string): value is AlertType {
  return Object.hasOwn(ALERT_VARIANTS, value);
}
