import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import chalk from 'chalk';
import type { RunReport, RunResult, RunSummary } from './types.js';

export function reportFileName(now: Date): string {
  return `organize-report-${now.toISOString().replace(/[:.]/g, '-')}.json`;
}

export async function writeRunReport(
  reportDir: string,
  run: { sourceDir: string; destinationDir: string; result: RunResult },
  now: Date = new Date()
): Promise<string> {
  const report: RunReport = {
    generatedAt: now.toISOString(),
    sourceDir: run.sourceDir,
    destinationDir: run.destinationDir,
    errorFiles: run.result.errorFiles,
    replaceSkipFiles: run.result.replaceSkipFiles,
  };

  await mkdir(reportDir, { recursive: true });

  const reportPath = join(reportDir, reportFileName(now));
  await writeFile(reportPath, JSON.stringify(report, null, 2));

  return reportPath;
}

export function summarizeRun(summary: RunSummary): void {
  console.log(chalk.cyan('\nOrganize Summary'));
  console.log(chalk.gray('─'.repeat(40)));

  if (summary.emptyMessage) {
    console.log(chalk.yellow(summary.emptyMessage));
    return;
  }

  const errorFiles = summary.result?.errorFiles ?? [];
  const skipFiles = summary.result?.replaceSkipFiles ?? [];

  console.log(`Songs found: ${summary.total}`);
  console.log(chalk.green(`  Copied: ${summary.moved}`));

  if (skipFiles.length > 0) {
    console.log(chalk.yellow(`  Already in destination: ${skipFiles.length}`));

    for (const entry of skipFiles) {
      console.log(chalk.yellow(`    - ${entry.fileName} → ${entry.newLocation}`));
    }
  }

  if (errorFiles.length > 0) {
    console.log(chalk.red(`  Failed: ${errorFiles.length}`));

    for (const entry of errorFiles) {
      console.log(chalk.red(`    - ${entry.fileName}: ${entry.error}`));

      if (entry.artistFound || entry.albumFound) {
        console.log(
          chalk.gray(`      artist: ${entry.artistFound || '(none)'}, album: ${entry.albumFound || '(none)'}`)
        );
      }
    }
  }
}
