import fs from 'fs';
import path from 'path';

export interface StagedFile {
  targetPath: string;
  tempPath: string;
  /** Moves the staged content over the target in one rename */
  commit(): Promise<void>;
  /** Removes the staged content, leaving the target untouched */
  discard(): Promise<void>;
}

/**
 * Writes content to a temp file beside the target. Nothing is visible at the
 * target path until `commit` is called.
 */
export async function stageFile(
  targetPath: string,
  content: string
): Promise<StagedFile> {
  const directory = path.dirname(targetPath);
  await fs.promises.mkdir(directory, { recursive: true });

  const tempPath = path.join(
    directory,
    `.${path.basename(targetPath)}.${process.pid}.${Date.now()}.tmp`
  );

  try {
    const handle = await fs.promises.open(tempPath, 'w');

    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    await removeIfExists(tempPath);
    throw error;
  }

  return {
    targetPath,
    tempPath,
    commit: async () => {
      try {
        await fs.promises.rename(tempPath, targetPath);
      } catch (error) {
        await removeIfExists(tempPath);
        throw error;
      }
    },
    discard: () => removeIfExists(tempPath),
  };
}

export default async function writeFileAtomic(
  targetPath: string,
  content: string
): Promise<void> {
  const staged = await stageFile(targetPath, content);
  await staged.commit();
}

async function removeIfExists(filePath: string): Promise<void> {
  await fs.promises.rm(filePath, { force: true });
}
