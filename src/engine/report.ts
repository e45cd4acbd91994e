import type { RunReport, SourceOutcome } from './run.js';

export const EXIT_OK = 0;
export const EXIT_CONFIG = 1;
export const EXIT_UNAUTHORIZED = 2;
export const EXIT_STORAGE = 3;

/**
 * Per-source transient failures do not fail the run; only credential
 * failures and an unreadable registry do, each with its own code.
 */
export function exitCodeFor(report: RunReport): number {
  if (report.loadError) return EXIT_STORAGE;
  if (report.fatal) return EXIT_UNAUTHORIZED;
  return EXIT_OK;
}

function row(label: string, rest: string): string {
  return `${label.padEnd(20)} ${rest}`;
}

export function formatOutcome(outcome: SourceOutcome): string {
  switch (outcome.status) {
    case 'notified':
      return outcome.persisted
        ? row('notified', `${outcome.sourceId}  ${outcome.itemId}  ${outcome.title}`)
        : row('notified', `${outcome.sourceId}  ${outcome.itemId}  (not recorded: ${outcome.updateError ?? 'unknown'})`);
    case 'skipped':
      return row('skipped-no-change', `${outcome.sourceId}  ${outcome.itemId}`);
    case 'error':
      return row(`error:${outcome.kind}`, `${outcome.sourceId}  ${outcome.message}`);
    case 'cancelled':
      return row('cancelled', outcome.sourceId);
  }
}

export function renderRunReport(report: RunReport): string[] {
  if (report.loadError) {
    return [`Registry ${report.loadError.kind}: ${report.loadError.message}`];
  }

  const lines = report.outcomes.map(formatOutcome);
  lines.push('');
  lines.push(
    `${report.outcomes.length} sources: ${report.notified} notified, ${report.skipped} skipped, ` +
      `${report.failed} failed, ${report.cancelled} cancelled (${report.durationMs}ms)`,
  );
  if (report.fatal) {
    lines.push(`Run aborted: ${report.fatal.kind} on ${report.fatal.sourceId}: ${report.fatal.message}`);
  }
  return lines;
}
