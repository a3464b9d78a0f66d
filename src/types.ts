/**
 * Raw tags as the container reports them. Keys keep their original spelling
 * (`©ART`, `TPE1`, `ARTIST`...); a key carrying several values lists them in
 * the order they were read.
 */
export type TagMap = Map<string, unknown[]>;

export type TagReader = (filePath: string) => Promise<TagMap>;

export interface Identity {
  artist: string;
  album: string;
}

export interface DestinationPlan {
  newDirectory: string;
  fileName: string;
  targetPath: string;
}

export type PlacementDecision =
  | { kind: 'collision'; plan: DestinationPlan }
  | { kind: 'proceed'; plan: DestinationPlan };

export interface SkippedFile {
  fileName: string;
  newLocation: string;
  sourcePath: string;
  error: string;
}

export interface ErrorFile {
  fileName: string;
  sourcePath: string;
  artistFound: string;
  albumFound: string;
  tagMap: Record<string, string[]>;
  error: string;
}

export type FileOutcome =
  | { status: 'moved'; sourcePath: string; targetPath: string }
  | { status: 'skipped'; entry: SkippedFile }
  | { status: 'errored'; entry: ErrorFile };

export interface RunResult {
  errorFiles: ErrorFile[];
  replaceSkipFiles: SkippedFile[];
}

export type OrganizeEvent =
  | { type: 'total'; count: number }
  | { type: 'empty'; message: string }
  | {
      type: 'progress';
      percent: number;
      processed: number;
      total: number;
      filePath: string;
      status: 'moved' | 'errored';
    }
  | { type: 'result'; result: RunResult };

export interface OrganizeOptions {
  sourceDir: string;
  destinationDir: string;
  removeIllegalChars: boolean;
  readTags?: TagReader;
}

export interface RunSummary {
  total: number;
  processed: number;
  moved: number;
  result: RunResult | null;
  emptyMessage: string | null;
}

export interface OrganizerConfig {
  remove_illegal_chars: boolean;
  music_folder_path: string;
  destination_folder_path: string;
  report_dir: string;
}

export interface RunReport {
  generatedAt: string;
  sourceDir: string;
  destinationDir: string;
  errorFiles: ErrorFile[];
  replaceSkipFiles: SkippedFile[];
}
