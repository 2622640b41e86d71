import type { Issue, Severity } from "./types.js";

const SEVERITY_EMOJI: Record<Severity, string> = {
  error: "🔴",
  warning: "🟡",
  info: "ℹ️",
};

export interface InlineFormatOptions {
  includeSeverityHeader?: boolean;
  /** Bodies longer than this are cut and marked as truncated */
  maxBodyLength?: number;
}

const TRUNCATION_MARKER = "\n\n_(truncated)_";

/**
 * Formats an issue into a line comment body: severity badge and category,
 * the issue text, and a suggestion block when a fix is attached.
 *
 * Over `maxBodyLength`, the text is cut before the suggestion block. The
 * block is kept whole or left out, never cut.
 */
export function formatInlineComment(issue: Issue, options: InlineFormatOptions = {}): string {
  const { includeSeverityHeader = true, maxBodyLength } = options;

  let text = issue.body;
  if (includeSeverityHeader) {
    const emoji = SEVERITY_EMOJI[issue.severity] ?? "";
    const label = issue.severity.charAt(0).toUpperCase() + issue.severity.slice(1);
    text = `**${emoji} ${label}** — ${issue.category}\n\n${text}`;
  }

  // GitHub suggestion block
  const suggestion = issue.suggestedFix ? `\n\n\`\`\`suggestion\n${issue.suggestedFix}\n\`\`\`` : "";

  if (maxBodyLength === undefined || text.length + suggestion.length <= maxBodyLength) {
    return text + suggestion;
  }
  if (suggestion.length + TRUNCATION_MARKER.length <= maxBodyLength) {
    return truncate(text, maxBodyLength - suggestion.length) + suggestion;
  }
  return truncate(text, maxBodyLength, suggestion.length > 0);
}

function truncate(text: string, limit: number, force = false): string {
  if (!force && text.length <= limit) return text;
  if (limit < TRUNCATION_MARKER.length) return text.slice(0, limit);
  return text.slice(0, limit - TRUNCATION_MARKER.length) + TRUNCATION_MARKER;
}
