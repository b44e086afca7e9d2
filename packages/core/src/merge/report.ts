/**
 * Conflict report — every conflict record of a merge run, keyed by file
 * path and identity key. The report, not the merged buffer, is what tells
 * a caller that a file needs manual attention.
 */

import type { ConflictReason, ConflictRecord } from './shared.js';

export interface ConflictReportJson {
  total: number;
  files: Record<string, ConflictRecord[]>;
}

export class ConflictReport {
  private readonly byPath = new Map<string, Map<string, ConflictRecord>>();

  /** Add records; a second record for the same path and key replaces the first. */
  add(records: Iterable<ConflictRecord>): void {
    for (const record of records) {
      const forPath = this.byPath.get(record.path) ?? new Map<string, ConflictRecord>();
      forPath.set(record.key, record);
      this.byPath.set(record.path, forPath);
    }
  }

  get(path: string, key: string): ConflictRecord | undefined {
    return this.byPath.get(path)?.get(key);
  }

  /** Records for one file, in the order they were added. */
  forPath(path: string): ConflictRecord[] {
    return [...(this.byPath.get(path)?.values() ?? [])];
  }

  paths(): string[] {
    return [...this.byPath.keys()].sort();
  }

  get size(): number {
    let total = 0;
    for (const records of this.byPath.values()) total += records.size;
    return total;
  }

  hasConflicts(path?: string): boolean {
    if (path === undefined) return this.size > 0;
    return (this.byPath.get(path)?.size ?? 0) > 0;
  }

  countByReason(): Record<ConflictReason, number> {
    const counts: Record<ConflictReason, number> = {
      'incompatible-edit': 0,
      'delete-modify': 0,
      'ambiguous-identity': 0,
    };
    for (const records of this.byPath.values()) {
      for (const record of records.values()) counts[record.reason]++;
    }
    return counts;
  }

  toJSON(): ConflictReportJson {
    const files: Record<string, ConflictRecord[]> = {};
    for (const path of this.paths()) files[path] = this.forPath(path);
    return { total: this.size, files };
  }
}

/** One human-readable line per record, as written next to a conflicted file. */
export function formatConflictLines(records: ConflictRecord[]): string[] {
  return records.map(record => {
    const caveat = record.lowConfidence ? ' (positional identity, low confidence)' : '';
    return `- ${record.reason}: ${record.key}${caveat}`;
  });
}
