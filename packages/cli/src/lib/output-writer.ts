/**
 * Writes a repository merge result to the output directory: one flattened
 * file per merged path, a `.conflicts.txt` next to each conflicted one,
 * and `report.json` with every conflict record.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { formatConflictLines, type RepositoryMergeResult } from '@structmerge/core';

export interface WrittenFile {
  path: string;
  outputPath: string;
  status: 'merged' | 'conflicted';
  conflictsPath?: string;
}

export interface WriteSummary {
  written: WrittenFile[];
  deleted: string[];
  reportPath: string;
}

/** Write to a temp file beside the target, then rename over it. */
export function writeFileAtomic(target: string, content: string): void {
  const tmp = `${target}.${process.pid}.tmp`;
  fs.writeFileSync(tmp, content);
  fs.renameSync(tmp, target);
}

/** `src__a.ts` → `src__a.conflicts.txt` */
export function conflictsFileName(outputName: string): string {
  const ext = path.extname(outputName);
  const stem = ext ? outputName.slice(0, -ext.length) : outputName;
  return `${stem}.conflicts.txt`;
}

export function writeMergeResult(result: RepositoryMergeResult, outDir: string): WriteSummary {
  fs.mkdirSync(outDir, { recursive: true });

  const written: WrittenFile[] = [];
  const deleted: string[] = [];

  for (const entry of result.files.values()) {
    if (entry.status === 'deleted') {
      deleted.push(entry.path);
      continue;
    }

    const outputPath = path.join(outDir, entry.outputName);
    writeFileAtomic(outputPath, entry.outcome.buffer);

    if (entry.status === 'conflicted') {
      const conflictsPath = path.join(outDir, conflictsFileName(entry.outputName));
      const lines = formatConflictLines(entry.outcome.conflicts);
      writeFileAtomic(conflictsPath, `${lines.join('\n')}\n`);
      written.push({ path: entry.path, outputPath, status: 'conflicted', conflictsPath });
    } else {
      written.push({ path: entry.path, outputPath, status: 'merged' });
    }
  }

  const reportPath = path.join(outDir, 'report.json');
  const report = {
    baseRef: result.baseRef,
    conflicts: result.report.toJSON(),
    failures: result.failures.map(f => ({ path: f.path, error: f.error.message })),
  };
  writeFileAtomic(reportPath, `${JSON.stringify(report, null, 2)}\n`);

  return { written, deleted, reportPath };
}
