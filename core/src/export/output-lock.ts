import { mkdir, open, rm } from 'node:fs/promises';
import path from 'node:path';
import { createReelsmithError, ErrorCode } from '../errors/index.js';

export interface OutputLock {
  readonly lockPath: string;
  release(): Promise<void>;
}

export function lockPathFor(outputPath: string): string {
  return `${outputPath}.lock`;
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Claims exclusive write access to an output path by creating `<output>.lock`.
 * Creation fails when another exporter holds the lock.
 *
 * @throws ReelsmithError (OUTPUT_LOCKED)
 */
export async function acquireOutputLock(outputPath: string): Promise<OutputLock> {
  const lockPath = lockPathFor(outputPath);
  await mkdir(path.dirname(lockPath), { recursive: true });

  try {
    const handle = await open(lockPath, 'wx');
    await handle.writeFile(`${process.pid}\n`);
    await handle.close();
  } catch (error) {
    if (isAlreadyExists(error)) {
      throw createReelsmithError(
        ErrorCode.OUTPUT_LOCKED,
        `Output ${outputPath} is being written by another export.`,
        {
          context: lockPath,
          suggestion: `Wait for the other export to finish, or delete ${lockPath} if it is stale.`,
        }
      );
    }
    throw error;
  }

  return {
    lockPath,
    async release() {
      await rm(lockPath, { force: true });
    },
  };
}
