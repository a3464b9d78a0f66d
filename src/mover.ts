import { existsSync, constants } from 'node:fs';
import { access, chmod, copyFile, mkdir, stat, utimes } from 'node:fs/promises';
import { dirname } from 'node:path';
import { MoveError, describeError } from './errors.js';

async function assertReadable(sourcePath: string): Promise<void> {
  if (!existsSync(sourcePath)) {
    throw new MoveError('SOURCE_UNAVAILABLE', `Source file not found: ${sourcePath}`);
  }

  try {
    await access(sourcePath, constants.R_OK);
  } catch (error) {
    throw new MoveError('SOURCE_UNAVAILABLE', `Cannot read source file: ${sourcePath}`, error);
  }
}

/**
 * Copies the file into place, carrying over its permission bits and
 * access/modification times. The source is left where it is.
 */
export async function copyWithMetadata(sourcePath: string, targetPath: string): Promise<void> {
  try {
    await mkdir(dirname(targetPath), { recursive: true });
    await assertReadable(sourcePath);

    if (existsSync(targetPath)) {
      throw new MoveError('DESTINATION_COLLISION', `Destination file already exists: ${targetPath}`);
    }

    const sourceStats = await stat(sourcePath);

    await copyFile(sourcePath, targetPath, constants.COPYFILE_EXCL);
    await chmod(targetPath, sourceStats.mode);
    await utimes(targetPath, sourceStats.atimeMs / 1000, sourceStats.mtimeMs / 1000);

    if (!existsSync(targetPath)) {
      throw new MoveError('COPY_VERIFICATION_FAILED', `File copy failed: ${targetPath}`);
    }
  } catch (error) {
    if (error instanceof MoveError) {
      throw error;
    }

    throw new MoveError('COPY_FAILED', describeError(error), error);
  }
}
