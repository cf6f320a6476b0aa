import pc from 'picocolors';
import type { BatchSummary } from '@envforge/core';
import type { MemoryPoolEntry } from '@envforge/memory';
import type { F2PReport } from '../commands/validate';
import type { LogClassification } from '../commands/classify';

/**
 * Prints command results either as pretty JSON (`--json`) or as a short
 * human summary.
 */
export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  renderBatch(summary: BatchSummary): void {
    if (this.isJson) return this.json(summary);

    const ok = summary.failed === 0;
    console.log(`\n${ok ? pc.green('Batch finished.') : pc.red('Batch finished with failures.')}`);
    console.log(`  Run ID: ${summary.runId}`);
    console.log(
      `  ${pc.green(`${summary.accepted} accepted`)}, ${pc.red(`${summary.failed} failed`)}, ` +
        `${pc.gray(`${summary.skipped} skipped`)} of ${summary.total}`,
    );

    const reasons = Object.entries(summary.failureReasons);
    if (reasons.length > 0) {
      console.log(pc.bold('\nFailure reasons:'));
      for (const [reason, ids] of reasons) {
        console.log(`  ${reason}: ${ids.length}`);
        ids.slice(0, 10).forEach((id) => console.log(pc.gray(`    - ${id}`)));
        if (ids.length > 10) {
          console.log(pc.gray(`    ... and ${ids.length - 10} more.`));
        }
      }
    }
  }

  renderValidation(report: F2PReport, reportPath: string): void {
    if (this.isJson) return this.json(report);

    for (const entry of report.instances) {
      if (entry.status === 'missing') {
        console.log(`  ${pc.yellow('?')} ${entry.instanceId}: ${entry.reason}`);
        continue;
      }
      const icon = entry.classification === 'FAIL2PASS' ? pc.green('✔') : pc.red('✘');
      const weak = entry.minimalFix.performed && !entry.minimalFix.passed ? pc.yellow(' (weak test)') : '';
      console.log(`  ${icon} ${entry.instanceId}: ${entry.classification}/${entry.diagnostic}${weak}`);
    }
    console.log(`\n${report.fail2pass}/${report.total} FAIL2PASS. Report: ${reportPath}`);
  }

  renderClassification(result: LogClassification, outPath: string): void {
    if (this.isJson) return this.json(result);

    for (const [bucket, count] of Object.entries(result.counts)) {
      console.log(`  ${bucket.padEnd(10)} ${count}`);
    }
    console.log(`\n${result.total} log pair(s) classified. Summary: ${outPath}`);
  }

  renderMemoryEntries(entries: readonly MemoryPoolEntry[]): void {
    if (this.isJson) return this.json(entries);

    if (entries.length === 0) {
      console.log('The Memory Pool is empty.');
      return;
    }
    for (const entry of entries) {
      console.log(
        `  ${pc.cyan(entry.fingerprint.slice(0, 12))} ${entry.repo}@${entry.version || '-'} ` +
          pc.gray(`(from ${entry.sourceInstanceId}, ${entry.updatedAt})`),
      );
    }
  }

  renderMemoryCleared(removed: number): void {
    if (this.isJson) return this.json({ removed });
    console.log(`Removed ${removed} Memory Pool entr${removed === 1 ? 'y' : 'ies'}.`);
  }

  private json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }
}
