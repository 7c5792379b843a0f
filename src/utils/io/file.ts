import fs from 'fs-extra';

/**
 * Utility class for file operations.
 */
export class FileUtils {
  /**
   * Reads a file's raw bytes, or returns null when it does not exist.
   */
  public static async readBytesIfExists(path: string): Promise<Buffer | null> {
    try {
      return await fs.readFile(path);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  /**
   * Checks if a path is a file.
   */
  public static async isFile(path: string): Promise<boolean> {
    try {
      const stats = await fs.stat(path);
      return stats.isFile();
    } catch {
      return false;
    }
  }

  /**
   * Resolves symlinks, returning null for a path that does not exist.
   */
  public static async realpathIfExists(path: string): Promise<string | null> {
    try {
      return await fs.realpath(path);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  public static isNotFound(error: unknown): boolean {
    return FileUtils.errorCode(error) === 'ENOENT';
  }

  public static errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
}
