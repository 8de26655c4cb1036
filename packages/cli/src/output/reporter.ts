/**
 * Reporter - Renders a GenerationReport as text or JSON
 */

import chalk from 'chalk';

import type { GenerationReport } from 'docstringer-core';

export type ReportFormat = 'text' | 'json';

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json'];

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * One line per generated or skipped package.
 * Returns an empty list when the directory held no Go package.
 */
export function formatTextReport(report: GenerationReport): string[] {
  const lines: string[] = [];
  for (const pkg of report.generated) {
    lines.push(
      `${chalk.green('✔')} ${pkg.packageName}: ${pkg.outputPath} (${plural(pkg.entries.length, 'constant')})`
    );
  }
  for (const pkg of report.skipped) {
    lines.push(`${chalk.gray('○')} ${pkg.packageName}: no constants of type ${report.typeName}`);
  }
  return lines;
}

export function formatJsonReport(report: GenerationReport): string {
  return JSON.stringify(
    {
      typeName: report.typeName,
      dir: report.dir,
      generated: report.generated,
      skipped: report.skipped,
      files: report.files,
      warnings: report.warnings,
    },
    null,
    2
  );
}
