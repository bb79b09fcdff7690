// Knowledge base: question -> answer records keyed by normalized question
import { readFile } from "node:fs/promises";
import type { QueryRecord } from "../../../shared/types";
import { normalize } from "./cache";

export interface LoadLogger {
  info(msg: string): void;
  warn(msg: string): void;
}

/**
 * Immutable after construction. Entries are kept in lexicographic order of their
 * normalized key, which is the order `entries()` yields them in; the matcher's
 * tie-break depends on it.
 */
export class KnowledgeBase {
  private readonly byKey: ReadonlyMap<string, QueryRecord>;

  private constructor(byKey: Map<string, QueryRecord>) {
    const sorted = [...byKey.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    this.byKey = new Map(sorted);
  }

  /** Later records with the same normalized question replace earlier ones. */
  static fromRecords(records: Iterable<QueryRecord>): KnowledgeBase {
    const byKey = new Map<string, QueryRecord>();
    for (const record of records) {
      const key = normalize(record.question);
      if (!key) continue;
      byKey.set(key, Object.freeze({ question: record.question, answer: record.answer }));
    }
    return new KnowledgeBase(byKey);
  }

  static empty(): KnowledgeBase {
    return new KnowledgeBase(new Map());
  }

  get size() {
    return this.byKey.size;
  }

  get(key: string): QueryRecord | undefined {
    return this.byKey.get(key);
  }

  entries(): IterableIterator<[string, QueryRecord]> {
    return this.byKey.entries();
  }
}

export type ParsedLine =
  | { ok: true; record: QueryRecord }
  | { ok: false; reason: string };

export function parseRecordLine(line: string): ParsedLine {
  let obj: unknown;
  try {
    obj = JSON.parse(line);
  } catch (e) {
    return { ok: false, reason: `invalid JSON (${e instanceof Error ? e.message : String(e)})` };
  }
  if (typeof obj !== "object" || obj === null || Array.isArray(obj)) {
    return { ok: false, reason: "not an object" };
  }
  const q = "q" in obj ? obj.q : undefined;
  const a = "a" in obj ? obj.a : undefined;
  if (typeof q !== "string" || !normalize(q)) {
    return { ok: false, reason: "missing or empty \"q\"" };
  }
  if (typeof a !== "string" || !a.trim()) {
    return { ok: false, reason: "missing or empty \"a\"" };
  }
  return { ok: true, record: { question: q, answer: a } };
}

/**
 * Builds a knowledge base from newline-delimited `{"q": ..., "a": ...}` records.
 * Blank lines are ignored; malformed lines are logged and skipped.
 */
export function parseKnowledgeBase(text: string, log: LoadLogger = console): KnowledgeBase {
  const records: QueryRecord[] = [];
  const lines = text.split(/\r?\n/);
  for (const [i, raw] of lines.entries()) {
    const line = raw.trim();
    if (!line) continue;
    const parsed = parseRecordLine(line);
    if (parsed.ok) {
      records.push(parsed.record);
    } else {
      log.warn(`Skipping knowledge base line ${i + 1}: ${parsed.reason}`);
    }
  }
  return KnowledgeBase.fromRecords(records);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Reads the knowledge base once at startup. A missing file is an empty base;
 * any other read error propagates.
 */
export async function loadKnowledgeBase(
  path: string,
  log: LoadLogger = console
): Promise<KnowledgeBase> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      log.warn(`Knowledge base not found at ${path}; starting with an empty base`);
      return KnowledgeBase.empty();
    }
    throw error;
  }
  const kb = parseKnowledgeBase(text, log);
  log.info(`✓ Loaded ${kb.size} knowledge base records from ${path}`);
  return kb;
}
