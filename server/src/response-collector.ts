/**
 * ResponseCollector: ordered buffer of the events one dispatch produces.
 *
 * Events are appended as the engine reports them and handed back to the HTTP
 * caller in insertion order. The buffer is cleared at the start of the next
 * dispatch; appended events are never touched again.
 */

import path from "path";
import type { FilesSnapshot, ResponseEvent, ResponseEventType, TokenUsage } from "./types.js";

export class ResponseCollector {
  private buffer: ResponseEvent[] = [];

  get events(): ResponseEvent[] {
    return [...this.buffer];
  }

  get size(): number {
    return this.buffer.length;
  }

  append(event: ResponseEvent): void {
    this.buffer.push(Object.freeze(event));
  }

  clear(): void {
    this.buffer = [];
  }

  ofType<T extends ResponseEventType>(type: T): Extract<ResponseEvent, { type: T }>[] {
    return this.buffer.filter((e): e is Extract<ResponseEvent, { type: T }> => e.type === type);
  }
}

/** Questions the engine asks before pulling a file into the chat. */
export function isFileAddQuestion(question: string): boolean {
  return (
    question.includes("Do you want to create") ||
    (question.includes("Add") && question.includes("to the chat"))
  );
}

// ── Token / cost extraction ─────────────────────────────────────────

const TOKEN_COST_PATTERN =
  /Tokens:\s*([\d.]+[km]?)\s*sent,\s*([\d.]+[km]?)\s*received\.\s*Cost:\s*\$([\d.]+)\s*message,\s*\$([\d.]+)\s*session\./i;

/** "2.5k" → 2500, "1.2m" → 1200000, "980" → 980. NaN when unparseable. */
export function parseTokenCount(raw: string): number {
  const value = raw.trim().toLowerCase();
  let multiplier = 1;
  let digits = value;
  if (value.endsWith("k")) {
    multiplier = 1_000;
    digits = value.slice(0, -1);
  } else if (value.endsWith("m")) {
    multiplier = 1_000_000;
    digits = value.slice(0, -1);
  }
  const parsed = Number.parseFloat(digits);
  return Number.isNaN(parsed) ? Number.NaN : Math.round(parsed * multiplier);
}

/** Extract the usage summary from a line of tool output, or null when it has none. */
export function parseTokenUsage(message: string): TokenUsage | null {
  const match = TOKEN_COST_PATTERN.exec(message);
  if (!match) return null;

  const [, sent, received, costMessage, costSession] = match;
  const usage: TokenUsage = {
    tokensSent: parseTokenCount(sent),
    tokensReceived: parseTokenCount(received),
    costMessage: Number.parseFloat(costMessage),
    costSession: Number.parseFloat(costSession),
  };

  if (Object.values(usage).some((n) => Number.isNaN(n))) return null;
  return usage;
}

/** Inverse of parseTokenCount, in the engine's display style. */
export function formatTokenCount(count: number): string {
  if (count < 1_000) return String(count);
  if (count < 10_000) return `${(count / 1_000).toFixed(1)}k`;
  if (count < 1_000_000) return `${Math.round(count / 1_000)}k`;
  return `${(count / 1_000_000).toFixed(1)}m`;
}

export function formatUsageLine(usage: TokenUsage): string {
  return (
    `Tokens: ${formatTokenCount(usage.tokensSent)} sent, ${formatTokenCount(usage.tokensReceived)} received. ` +
    `Cost: $${usage.costMessage.toFixed(4)} message, $${usage.costSession.toFixed(4)} session.`
  );
}

// ── Files snapshot ──────────────────────────────────────────────────

/** Path relative to root, or the absolute path when no relative form exists. */
export function relativeFileName(absPath: string, root: string): string {
  const rel = path.relative(root, absPath);
  return path.isAbsolute(rel) ? absPath : rel;
}

export function formatFilesSnapshot(
  root: string,
  relFiles: string[],
  relReadOnlyFiles: string[],
  editFormat?: string
): FilesSnapshot {
  const readOnlySet = new Set(relReadOnlyFiles);
  const editable = [...new Set(relFiles)].filter((f) => !readOnlySet.has(f)).sort();

  // Shorter of absolute and relative form
  const readOnly = [...readOnlySet].sort().map((rel) => {
    const abs = path.resolve(root, rel);
    return abs.length < rel.length ? abs : rel;
  });

  const snapshot: FilesSnapshot = { editable, readOnly };
  if (editFormat) snapshot.editFormat = editFormat;
  return snapshot;
}
