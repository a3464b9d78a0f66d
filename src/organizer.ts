import { basename } from 'node:path';
import { describeError, IdentityMissingError } from './errors.js';
import { resolveIdentity } from './identity.js';
import { describeTagMap, readTagMap } from './metadata.js';
import { copyWithMetadata } from './mover.js';
import { ALREADY_EXISTS_MESSAGE, planPlacement } from './planner.js';
import { sanitizeSegment } from './sanitize.js';
import { discoverMusicFiles } from './scanner.js';
import type {
  ErrorFile,
  FileOutcome,
  OrganizeEvent,
  OrganizeOptions,
  RunSummary,
  SkippedFile,
  TagMap,
  TagReader,
} from './types.js';

export const EMPTY_SOURCE_MESSAGE = 'No songs were found in the selected folder.';

export interface FileContext {
  destinationDir: string;
  removeIllegalChars: boolean;
  readTags: TagReader;
}

/**
 * Runs one file through extract → resolve → plan → copy. Every failure is
 * turned into an `errored` outcome here; nothing escapes to the run loop.
 */
export async function organizeFile(filePath: string, context: FileContext): Promise<FileOutcome> {
  const fileName = basename(filePath);
  let tagMap: TagMap = new Map();
  let artistFound = '';
  let albumFound = '';

  try {
    tagMap = await context.readTags(filePath);

    const identity = resolveIdentity(tagMap);
    artistFound = identity.artist;
    albumFound = identity.album;

    const decision = planPlacement(
      context.destinationDir,
      sanitizeSegment(identity.artist, context.removeIllegalChars),
      sanitizeSegment(identity.album, context.removeIllegalChars),
      fileName
    );

    if (decision.kind === 'collision') {
      const entry: SkippedFile = {
        fileName,
        newLocation: decision.plan.newDirectory,
        sourcePath: filePath,
        error: ALREADY_EXISTS_MESSAGE,
      };

      return { status: 'skipped', entry };
    }

    await copyWithMetadata(filePath, decision.plan.targetPath);

    return { status: 'moved', sourcePath: filePath, targetPath: decision.plan.targetPath };
  } catch (error) {
    if (error instanceof IdentityMissingError) {
      artistFound = error.artistFound;
      albumFound = error.albumFound;
    }

    const entry: ErrorFile = {
      fileName,
      sourcePath: filePath,
      artistFound,
      albumFound,
      tagMap: describeTagMap(tagMap),
      error: describeError(error),
    };

    return { status: 'errored', entry };
  }
}

/**
 * One organize run. Files are handled one at a time in discovery order and
 * the run reports only through the events it yields: `total`, then either
 * `empty` or one `progress` per moved/errored file followed by `result`.
 *
 * Collisions do not advance the progress counter, so the last percentage
 * stays below 100 when any file was skipped.
 */
export async function* organizeMusic(
  options: OrganizeOptions
): AsyncGenerator<OrganizeEvent, void, undefined> {
  const context: FileContext = {
    destinationDir: options.destinationDir,
    removeIllegalChars: options.removeIllegalChars,
    readTags: options.readTags ?? readTagMap,
  };

  const files = await discoverMusicFiles(options.sourceDir);
  const total = files.length;

  yield { type: 'total', count: total };

  if (total === 0) {
    yield { type: 'empty', message: EMPTY_SOURCE_MESSAGE };
    return;
  }

  const errorFiles: ErrorFile[] = [];
  const replaceSkipFiles: SkippedFile[] = [];
  let processed = 0;

  for (const filePath of files) {
    const outcome = await organizeFile(filePath, context);

    if (outcome.status === 'skipped') {
      replaceSkipFiles.push(outcome.entry);
      continue;
    }

    if (outcome.status === 'errored') {
      errorFiles.push(outcome.entry);
    }

    processed++;

    yield {
      type: 'progress',
      percent: Math.round((processed / total) * 100),
      processed,
      total,
      filePath,
      status: outcome.status,
    };
  }

  yield {
    type: 'result',
    result: { errorFiles: [...errorFiles], replaceSkipFiles: [...replaceSkipFiles] },
  };
}

export async function organizeAll(
  options: OrganizeOptions,
  onEvent?: (event: OrganizeEvent) => void
): Promise<RunSummary> {
  const summary: RunSummary = {
    total: 0,
    processed: 0,
    moved: 0,
    result: null,
    emptyMessage: null,
  };

  for await (const event of organizeMusic(options)) {
    onEvent?.(event);

    switch (event.type) {
      case 'total':
        summary.total = event.count;
        break;

      case 'empty':
        summary.emptyMessage = event.message;
        break;

      case 'progress':
        summary.processed = event.processed;

        if (event.status === 'moved') {
          summary.moved++;
        }
        break;

      case 'result':
        summary.result = event.result;
        break;
    }
  }

  return summary;
}
