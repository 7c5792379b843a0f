import fs from 'fs-extra';
import path from 'path';
import { randomBytes } from 'crypto';
import { logger } from '../cli/logger';
import { FileUtils } from './file';

const log = logger.scoped('atomic');

/**
 * AtomicFileWriter replaces a file's content in one step.
 *
 * The new content is staged in a temporary file in the same directory as the
 * target and then renamed over it. Readers see either the old file or the new
 * one, never a partial write. A rename across directories is not atomic on
 * every filesystem, which is why the staging file lives next to the target.
 *
 * A target that is a symlink is written through: the file the link points to
 * is replaced and the link itself stays in place.
 */
export class AtomicFileWriter {
  private static readonly pending = new Set<string>();

  /**
   * Write `content` to `targetPath`, creating parent directories as needed.
   * On failure the staging file is removed and the target is left untouched.
   */
  public async write(targetPath: string, content: string | Uint8Array): Promise<void> {
    const destination = await AtomicFileWriter.destination(targetPath);
    if (destination !== targetPath) {
      log.debug(`${targetPath} is a link to ${destination}`);
    }
    await fs.ensureDir(path.dirname(destination));

    const tempPath = AtomicFileWriter.stagingPath(destination);
    AtomicFileWriter.pending.add(tempPath);

    try {
      await this.stage(tempPath, content, destination);
      log.debug(`staged ${content.length} bytes in ${tempPath}`);
      await this.commit(tempPath, destination);
      log.debug(`renamed ${tempPath} -> ${destination}`);
    } catch (error) {
      await this.discard(tempPath);
      throw error;
    } finally {
      AtomicFileWriter.pending.delete(tempPath);
    }
  }

  /**
   * Write the staging file, keeping the target's permission bits when it exists
   */
  protected async stage(
    tempPath: string,
    content: string | Uint8Array,
    targetPath: string
  ): Promise<void> {
    let mode: number | undefined;
    try {
      mode = (await fs.stat(targetPath)).mode & 0o777;
    } catch {
      mode = undefined;
    }

    await fs.writeFile(tempPath, content, { mode, flag: 'wx' });
  }

  protected async commit(tempPath: string, targetPath: string): Promise<void> {
    await fs.rename(tempPath, targetPath);
  }

  private async discard(tempPath: string): Promise<void> {
    try {
      await fs.remove(tempPath);
    } catch (error) {
      log.warn(`Could not remove staging file ${tempPath}:`, error);
    }
  }

  /**
   * Staging files that have been created but not yet renamed
   */
  public static pendingFiles(): string[] {
    return [...AtomicFileWriter.pending];
  }

  /**
   * Remove every staging file still pending. Used when the process is
   * interrupted between staging and rename.
   */
  public static removePendingSync(): void {
    for (const tempPath of AtomicFileWriter.pending) {
      fs.removeSync(tempPath);
      AtomicFileWriter.pending.delete(tempPath);
    }
  }

  /**
   * The file a write to `targetPath` should replace. Links are followed, and a
   * dangling link resolves to the path it names so the link survives.
   */
  private static async destination(targetPath: string): Promise<string> {
    const real = await FileUtils.realpathIfExists(targetPath);
    if (real !== null) return real;

    try {
      const link = await fs.readlink(targetPath);
      return path.resolve(path.dirname(targetPath), link);
    } catch (error) {
      // ENOENT: nothing there yet; EINVAL: not a link
      const code = FileUtils.errorCode(error);
      if (code === 'ENOENT' || code === 'EINVAL') return targetPath;
      throw error;
    }
  }

  private static stagingPath(targetPath: string): string {
    const dir = path.dirname(targetPath);
    const base = path.basename(targetPath);
    const suffix = randomBytes(4).toString('hex');
    return path.join(dir, `.${base}.${process.pid}.${suffix}.tmp`);
  }
}
