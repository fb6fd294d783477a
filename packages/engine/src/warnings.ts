import type { Diagnostic } from "@voxbrick/core";

export type EngineWarningCode = "UNKNOWN_BLOCK" | "MALFORMED_PROPERTIES";

export interface WarningEntry {
  code: EngineWarningCode;
  source: string;
  occurrences: number;
}

export interface WarningSummary {
  total: number;
  entries: WarningEntry[];
}

const MESSAGES: Record<EngineWarningCode, (source: string) => string> = {
  UNKNOWN_BLOCK: (source) => `Unknown block ${source}; rendered as a light gray brick`,
  MALFORMED_PROPERTIES: (source) => `Block ${source} has no facing; assumed north`
};

/** Counts recoverable conditions by (code, source) during one conversion. */
export class WarningCollector {
  private readonly counts = new Map<string, WarningEntry>();
  private count = 0;

  public add(code: EngineWarningCode, source: string): void {
    this.count++;
    const key = `${code}|${source}`;
    const existing = this.counts.get(key);
    if (existing) {
      existing.occurrences += 1;
    } else {
      this.counts.set(key, { code, source, occurrences: 1 });
    }
  }

  public get total(): number {
    return this.count;
  }

  public summary(): WarningSummary {
    const entries = [...this.counts.values()]
      .map((e) => ({ ...e }))
      .sort(
        (a, b) =>
          b.occurrences - a.occurrences || a.code.localeCompare(b.code) || a.source.localeCompare(b.source)
      );
    return { total: this.count, entries };
  }
}

export function describeWarning(entry: WarningEntry): Diagnostic {
  return {
    code: entry.code,
    severity: "warning",
    message: `${MESSAGES[entry.code](entry.source)} (x${entry.occurrences})`
  };
}
