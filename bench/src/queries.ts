import { readFile } from "node:fs/promises";

export class QueryFileError extends Error {
  constructor(message: string, readonly path: string) {
    super(message);
    this.name = "QueryFileError";
  }
}

export function parseQueries(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * One query per line; blank lines are dropped. An unreadable or empty file is a
 * configuration error and is raised before any traffic is sent.
 */
export async function loadQueries(path: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new QueryFileError(`Cannot read query file ${path}: ${reason}`, path);
  }
  const queries = parseQueries(text);
  if (queries.length === 0) {
    throw new QueryFileError(`Query file ${path} is empty`, path);
  }
  return queries;
}
