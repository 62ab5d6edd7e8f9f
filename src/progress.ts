// src/progress.ts
import { AsciiTable3, AlignmentEnum } from "ascii-table3";
import type { RunSummary } from "./run-summary.js";
import type { JobErrorDetail } from "./errors.js";
import { formatElapsed } from "./util.js";

export type ProgressStream = {
  write(chunk: string): unknown;
  isTTY?: boolean;
};

export type ProgressBarOptions = {
  width?: number;
  prefix?: string;
  suffix?: string;
  fill?: string;
};

export function renderProgressBar(
  done: number,
  total: number,
  { width = 50, prefix = "Progress:", suffix = "Complete", fill = "█" }: ProgressBarOptions = {},
): string {
  const ratio = total > 0 ? Math.min(1, Math.max(0, done / total)) : 1;
  const filled = Math.floor(width * ratio);
  const bar = fill.repeat(filled) + "-".repeat(width - filled);
  return `${prefix} |${bar}| ${(ratio * 100).toFixed(1)}% ${suffix}`;
}

export function formatSummaryLine(summary: RunSummary): string {
  const parts = [
    `${summary.succeeded} succeeded`,
    `${summary.failed} failed`,
    `${summary.skippedCount} skipped`,
  ];
  if (summary.continuousEstablished || summary.continuousFailed) {
    parts.push(
      `continuous: ${summary.continuousEstablished} established, ${summary.continuousFailed} failed`,
    );
  }
  return `${summary.total} selected: ${parts.join(", ")}`;
}

function describe(detail?: JobErrorDetail): string {
  if (!detail) return "-";
  return detail.statusCode !== undefined
    ? `${detail.message} (HTTP ${detail.statusCode})`
    : detail.message;
}

/** Table of every database that needs attention, or null if there are none. */
export function renderProblemTable(summary: RunSummary): string | null {
  const rows: [string, string, string, string][] = [];
  for (const result of summary.failures()) {
    rows.push([result.database, "replication failed", result.error?.kind ?? "-", describe(result.error)]);
  }
  for (const result of summary.continuousFailures()) {
    rows.push([
      result.database,
      "continuous setup failed",
      result.continuousError?.kind ?? "-",
      describe(result.continuousError),
    ]);
  }
  if (rows.length === 0) return null;
  const table = new AsciiTable3("Problems")
    .setHeading("Database", "Problem", "Kind", "Detail")
    .setStyle("unicode-round");
  [1, 2, 3, 4].forEach((idx) => table.setAlign(idx, AlignmentEnum.LEFT));
  for (const row of rows) {
    table.addRow(...row);
  }
  return table.toString();
}

export type ProgressReporterOptions = {
  out?: ProgressStream;
  quiet?: boolean;
  now?: () => Date;
};

/**
 * Terminal output of a run: start and end banners, a progress bar redrawn
 * in place while jobs finish (TTY only), and the final summary.
 */
export class ProgressReporter {
  private readonly out: ProgressStream;
  private readonly quiet: boolean;
  private readonly now: () => Date;
  private barDrawn = false;

  constructor({ out = process.stdout, quiet = false, now = () => new Date() }: ProgressReporterOptions = {}) {
    this.out = out;
    this.quiet = quiet;
    this.now = now;
  }

  start(total: number): void {
    if (this.quiet) return;
    this.out.write(`Replication started at ${this.now().toISOString()}\n`);
    this.draw(0, total);
  }

  update(summary: RunSummary): void {
    if (this.quiet) return;
    this.draw(summary.completed, summary.total);
  }

  finish(summary: RunSummary): void {
    if (this.quiet) return;
    if (this.barDrawn) {
      this.out.write("\n");
      this.barDrawn = false;
    }
    this.out.write(`Replication ended at ${this.now().toISOString()}\n`);
    this.out.write(
      `Replication of ${summary.total} databases took ${formatElapsed(summary.elapsedMs)}\n`,
    );
    this.out.write(`${formatSummaryLine(summary)}\n`);
    const table = renderProblemTable(summary);
    if (table) this.out.write(`${table}\n`);
  }

  private draw(done: number, total: number) {
    if (!this.out.isTTY) return;
    this.out.write(`\r${renderProgressBar(done, total)}`);
    this.barDrawn = true;
  }
}
