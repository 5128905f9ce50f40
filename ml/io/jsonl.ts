import fs from "node:fs";
import { StringDecoder } from "node:string_decoder";

import { assertInputExists } from "./csv_io";

export type JsonlReadStats = {
  lines: number;
  skip_malformed_json: number;
};

export type JsonlReadOptions = {
  stage?: string;
  /** Bytes per read; lines may span any number of chunks. */
  chunkSize?: number;
};

const DEFAULT_CHUNK_SIZE = 1 << 20;

export function createJsonlReadStats(): JsonlReadStats {
  return { lines: 0, skip_malformed_json: 0 };
}

function* parseLines(lines: Iterable<string>, stats: JsonlReadStats): Generator<unknown, void, undefined> {
  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    stats.lines += 1;
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      stats.skip_malformed_json += 1;
      continue;
    }
    yield parsed;
  }
}

/**
 * Yields one parsed value per non-blank line. Malformed lines are counted in `stats` and
 * skipped.
 */
export function parseJsonlLines(content: string, stats: JsonlReadStats): Generator<unknown, void, undefined> {
  return parseLines(content.split(/\r?\n/), stats);
}

/** Reads `filePath` a chunk at a time; only the current partial line is held between reads. */
export function* readFileLines(filePath: string, chunkSize = DEFAULT_CHUNK_SIZE): Generator<string, void, undefined> {
  const fd = fs.openSync(filePath, "r");
  const buffer = Buffer.alloc(chunkSize);
  const decoder = new StringDecoder("utf8");
  let pending = "";
  try {
    for (;;) {
      const bytesRead = fs.readSync(fd, buffer, 0, chunkSize, null);
      if (bytesRead === 0) break;
      pending += decoder.write(buffer.subarray(0, bytesRead));
      let start = 0;
      let newline = pending.indexOf("\n");
      while (newline !== -1) {
        yield pending.slice(start, newline).replace(/\r$/, "");
        start = newline + 1;
        newline = pending.indexOf("\n", start);
      }
      pending = pending.slice(start);
    }
    pending += decoder.end();
    if (pending) yield pending.replace(/\r$/, "");
  } finally {
    fs.closeSync(fd);
  }
}

/** Fails at once when the file is missing; records are then read lazily. */
export function readJsonlRecords(
  filePath: string,
  stats: JsonlReadStats,
  options: JsonlReadOptions = {}
): Generator<unknown, void, undefined> {
  assertInputExists(filePath, options.stage ?? "load");
  return parseLines(readFileLines(filePath, options.chunkSize), stats);
}
