import { constants } from 'node:fs';
import { input, confirm } from '@inquirer/prompts';
import { expandPath } from './config.js';
import { checkFolder } from './folders.js';

export interface FolderSelection {
  sourceDir: string;
  destinationDir: string;
}

async function promptForFolder(message: string, defaultPath: string, mode: number): Promise<string> {
  const answer = await input({
    message,
    default: defaultPath || undefined,
    validate: async (value) => (await checkFolder(expandPath(value.trim()), mode)) ?? true,
  });

  return expandPath(answer.trim());
}

export async function promptForFolders(defaults: Partial<FolderSelection>): Promise<FolderSelection> {
  const sourceDir = await promptForFolder(
    'Music folder to organize:',
    defaults.sourceDir ?? '',
    constants.R_OK
  );

  const destinationDir = await promptForFolder(
    'Destination folder:',
    defaults.destinationDir ?? '',
    constants.R_OK | constants.W_OK
  );

  return { sourceDir, destinationDir };
}

export async function confirmRun(selection: FolderSelection, removeIllegalChars: boolean): Promise<boolean> {
  const charsNote = removeIllegalChars ? 'removing illegal characters' : 'keeping names as tagged';

  return confirm({
    message: `Copy songs from ${selection.sourceDir} into ${selection.destinationDir}/Artist/Album (${charsNote})?`,
    default: true,
  });
}
