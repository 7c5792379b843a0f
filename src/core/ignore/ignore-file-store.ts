import { IgnoreFileIOException } from '@/core/exceptions';
import { AtomicFileWriter } from '@/utils/io/atomic-writer';
import { FileUtils } from '@/utils/io/file';
import { logger } from '@/utils/cli/logger';
import type { AppendOptions, AppendReport } from './types';

const log = logger.scoped('store');

const LF = 0x0a;

/**
 * IgnoreFileStore appends patterns to one ignore file.
 *
 * Each call is a self-contained read-modify-write: the file is read, the new
 * patterns are compared against the patterns already in it, and the full new
 * content is written back through {@link AtomicFileWriter}. The file is handled
 * as bytes, so existing content is copied unchanged whatever its encoding;
 * only lines are added at the end.
 *
 * Concurrent writers are not coordinated. Two processes appending to the same
 * file at once can lose one side's additions, but never leave a torn file.
 */
export class IgnoreFileStore {
  constructor(private readonly writer: AtomicFileWriter = new AtomicFileWriter()) {}

  public async append(
    targetPath: string,
    candidatePatterns: readonly string[],
    allowDuplicates: boolean = false,
    options: AppendOptions = {}
  ): Promise<AppendReport> {
    const existing = await this.read(targetPath);

    const { toAdd, skippedDuplicates } = IgnoreFileStore.partition(
      IgnoreFileStore.existingPatterns(existing?.toString('utf8') ?? ''),
      candidatePatterns,
      allowDuplicates
    );

    const report: AppendReport = {
      addedPatterns: toAdd,
      skippedDuplicates,
      targetPath,
      created: false,
    };

    if (toAdd.length === 0) {
      log.debug(`nothing to add to ${targetPath}`);
      return report;
    }

    const base = existing ?? Buffer.from(options.header ?? '', 'utf8');
    const next = IgnoreFileStore.appendLines(base, toAdd);

    try {
      await this.writer.write(targetPath, next);
    } catch (error) {
      throw new IgnoreFileIOException(targetPath, 'write', error);
    }

    log.debug(`appended ${toAdd.length} pattern(s) to ${targetPath}`);
    return { ...report, created: existing === null };
  }

  /**
   * Patterns already present: trimmed lines that are neither blank nor comments
   */
  public static existingPatterns(content: string): Set<string> {
    const patterns = new Set<string>();
    for (const line of content.split(/\r?\n/)) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('#')) patterns.add(trimmed);
    }
    return patterns;
  }

  /**
   * Split candidates into the ones to write and the ones already present.
   * Candidates are stripped of line breaks and trimmed; blank ones are dropped.
   */
  public static partition(
    existing: ReadonlySet<string>,
    candidates: readonly string[],
    allowDuplicates: boolean
  ): { toAdd: string[]; skippedDuplicates: string[] } {
    const seen = new Set(existing);
    const toAdd: string[] = [];
    const skippedDuplicates: string[] = [];

    for (const candidate of candidates) {
      const pattern = IgnoreFileStore.sanitize(candidate);
      if (!pattern) {
        log.debug(`dropping blank pattern ${JSON.stringify(candidate)}`);
        continue;
      }

      if (!allowDuplicates && seen.has(pattern)) {
        skippedDuplicates.push(pattern);
        continue;
      }

      seen.add(pattern);
      toAdd.push(pattern);
    }

    return { toAdd, skippedDuplicates };
  }

  /**
   * Append one line per pattern, terminating the existing last line first.
   * Files that already use CRLF get CRLF for the new lines too.
   */
  public static appendLines(content: Buffer, patterns: readonly string[]): Buffer {
    const eol = content.includes('\r\n') ? '\r\n' : '\n';
    const needsTerminator = content.length > 0 && content[content.length - 1] !== LF;
    const lines = patterns.map((pattern) => pattern + eol).join('');

    return Buffer.concat([
      content,
      Buffer.from(needsTerminator ? eol + lines : lines, 'utf8'),
    ]);
  }

  public static sanitize(pattern: string): string {
    return pattern.replace(/[\r\n]/g, '').trim();
  }

  private async read(targetPath: string): Promise<Buffer | null> {
    try {
      return await FileUtils.readBytesIfExists(targetPath);
    } catch (error) {
      throw new IgnoreFileIOException(targetPath, 'read', error);
    }
  }
}
