export type CorpusLogLevel = "info" | "warn" | "error";

export type CorpusCounts = Readonly<Record<string, number>>;

export type CorpusLogEntry = {
  at: string;
  level: CorpusLogLevel;
  message: string;
  counts?: CorpusCounts;
};

export type CorpusLogger = {
  entries: CorpusLogEntry[];
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  /** Logs `label` followed by non-zero counters as `key=value`; the entry keeps every counter. */
  counts: (label: string, counts: CorpusCounts) => void;
};

export function formatCounts(counts: CorpusCounts): string {
  return Object.entries(counts)
    .filter(([, value]) => value !== 0)
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
}

const CONSOLE_BY_LEVEL: Record<CorpusLogLevel, (line: string) => void> = {
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
};

export function createCorpusLogger(options: { silent?: boolean } = {}): CorpusLogger {
  const entries: CorpusLogEntry[] = [];

  const push = (level: CorpusLogLevel, message: string, counts?: CorpusCounts) => {
    const entry: CorpusLogEntry = { at: new Date().toISOString(), level, message };
    if (counts) entry.counts = { ...counts };
    entries.push(entry);
    if (!options.silent) CONSOLE_BY_LEVEL[level](`[corpus:${level}] ${message}`);
  };

  return {
    entries,
    info: (message) => push("info", message),
    warn: (message) => push("warn", message),
    error: (message) => push("error", message),
    counts: (label, counts) => {
      const rendered = formatCounts(counts);
      push("info", rendered ? `${label} ${rendered}` : label, counts);
    },
  };
}
