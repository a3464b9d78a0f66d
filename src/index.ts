#!/usr/bin/env node
import { basename, resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import { loadConfig, saveConfig, expandPath } from './config.js';
import { describeError, DiscoveryError } from './errors.js';
import { validateFolders } from './folders.js';
import { organizeAll } from './organizer.js';
import { confirmRun, promptForFolders } from './prompts.js';
import type { FolderSelection } from './prompts.js';
import { summarizeRun, writeRunReport } from './report.js';
import type { OrganizeEvent, RunSummary } from './types.js';

function printUsage(): void {
  console.log(`
Usage: organize-music [musicFolder] [destinationFolder] [--keep-illegal-chars] [--yes]

Copies every song under musicFolder into destinationFolder/Artist/Album,
using the artist and album tags embedded in each file.

Options:
  --keep-illegal-chars   Keep : * ? < > | / \\ " ' and ... in folder names
  --yes                  Skip the confirmation prompt
  --help                 Show this message
`);
}

async function selectFolders(positional: string[], defaults: FolderSelection): Promise<FolderSelection> {
  const [source, destination] = positional;

  if (source && destination) {
    return { sourceDir: expandPath(source), destinationDir: expandPath(destination) };
  }

  return promptForFolders({
    sourceDir: source ? expandPath(source) : defaults.sourceDir,
    destinationDir: defaults.destinationDir,
  });
}

async function runOrganize(args: string[]): Promise<void> {
  console.log(chalk.cyan('\n🎵 Music Organizer\n'));

  const config = await loadConfig();
  const positional = args.filter((arg) => !arg.startsWith('--'));
  const removeIllegalChars = args.includes('--keep-illegal-chars') ? false : config.remove_illegal_chars;

  const selection = await selectFolders(positional, {
    sourceDir: config.music_folder_path,
    destinationDir: config.destination_folder_path,
  });

  try {
    await validateFolders(selection.sourceDir, selection.destinationDir);
  } catch (error) {
    console.error(chalk.red(describeError(error)));
    process.exitCode = 1;
    return;
  }

  if (!args.includes('--yes')) {
    const proceed = await confirmRun(selection, removeIllegalChars);

    if (!proceed) {
      console.log(chalk.yellow('Cancelled.'));
      return;
    }
  }

  const spinner = ora('Discovering music files...').start();
  const progressBar = new cliProgress.SingleBar({
    format: 'Organizing |{bar}| {percentage}% | {file}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });

  const onEvent = (event: OrganizeEvent): void => {
    switch (event.type) {
      case 'total':
        if (event.count === 0) {
          spinner.warn('Found 0 music files');
        } else {
          spinner.succeed(`Found ${event.count} music files`);
          progressBar.start(100, 0, { file: '' });
        }
        break;

      case 'progress':
        progressBar.update(event.percent, { file: basename(event.filePath) });
        break;

      case 'result':
        progressBar.stop();
        break;

      case 'empty':
        break;
    }
  };

  let summary: RunSummary;

  try {
    summary = await organizeAll(
      {
        sourceDir: selection.sourceDir,
        destinationDir: selection.destinationDir,
        removeIllegalChars,
      },
      onEvent
    );
  } catch (error) {
    progressBar.stop();

    if (error instanceof DiscoveryError) {
      spinner.fail(error.message);
      process.exitCode = 1;
      return;
    }

    throw error;
  }

  summarizeRun(summary);

  await saveConfig({
    ...config,
    music_folder_path: resolve(selection.sourceDir),
    destination_folder_path: resolve(selection.destinationDir),
  });

  if (summary.result && (summary.result.errorFiles.length > 0 || summary.result.replaceSkipFiles.length > 0)) {
    const reportPath = await writeRunReport(config.report_dir, {
      sourceDir: selection.sourceDir,
      destinationDir: selection.destinationDir,
      result: summary.result,
    });

    console.log(chalk.gray(`\nReport saved to: ${reportPath}`));
  }
}

const args = process.argv.slice(2);

if (args.includes('--help')) {
  printUsage();
} else {
  runOrganize(args).catch((error: unknown) => {
    console.error(chalk.red(describeError(error)));
    process.exitCode = 1;
  });
}
