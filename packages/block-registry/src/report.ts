export interface UnknownBlockReportEntry {
  source: string;
  occurrences: number;
}

export interface UnknownBlockReport {
  totalUnknown: number;
  entries: UnknownBlockReportEntry[];
}

export function buildUnknownBlockReport(sources: Iterable<string>): UnknownBlockReport {
  const counts = new Map<string, UnknownBlockReportEntry>();
  let total = 0;
  for (const source of sources) {
    total++;
    const existing = counts.get(source);
    if (existing) {
      existing.occurrences += 1;
    } else {
      counts.set(source, { source, occurrences: 1 });
    }
  }
  const entries = [...counts.values()].sort(
    (a, b) => b.occurrences - a.occurrences || a.source.localeCompare(b.source)
  );
  return { totalUnknown: total, entries };
}
