/**
 * Copies generated sentences into the PWA folder so the offline page and its
 * service worker pick them up on the next install.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { SYNC_CONFIG } from '../../shared/constants/index.js';
import { SentenceGroup, SyncConfig, SyncSummary } from '../../shared/types/index.js';
import { SentenceDataSchema, formatIssues } from '../../shared/utils/manifest-schemas.js';
import { createSyncError, describeError } from '../../shared/utils/errors.js';

export class PwaSyncService {
  private config: SyncConfig;

  constructor(private readonly rootDir: string, config: Partial<SyncConfig> = {}) {
    this.config = {
      sourcePath: SYNC_CONFIG.SOURCE_PATH,
      pwaDirectory: SYNC_CONFIG.PWA_DIRECTORY,
      destinationFilename: SYNC_CONFIG.DESTINATION_FILENAME,
      ...config
    };
  }

  get sourcePath(): string {
    return path.resolve(this.rootDir, this.config.sourcePath);
  }

  get destinationPath(): string {
    return path.resolve(this.rootDir, this.config.pwaDirectory, this.config.destinationFilename);
  }

  /**
   * Validate the generated sentence file and copy it into the PWA folder.
   * Invalid data is never copied.
   */
  async sync(): Promise<SyncSummary> {
    const groups = await this.readSentences();

    try {
      await fs.mkdir(path.dirname(this.destinationPath), { recursive: true });
      await fs.copyFile(this.sourcePath, this.destinationPath);
    } catch (error) {
      throw createSyncError('COPY_FAILED', `Failed to copy sentences: ${describeError(error)}`, this.destinationPath, error);
    }

    return {
      words: groups.length,
      sentences: groups.reduce((total, group) => total + group.sentences.length, 0),
      destination: this.destinationPath
    };
  }

  private async readSentences(): Promise<SentenceGroup[]> {
    let content: string;
    try {
      content = await fs.readFile(this.sourcePath, 'utf-8');
    } catch (error) {
      throw createSyncError('SOURCE_NOT_FOUND', `${this.config.sourcePath} not found`, this.sourcePath, error);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw createSyncError('INVALID_DATA', `${this.config.sourcePath} is not valid JSON`, this.sourcePath, error);
    }

    const parseResult = SentenceDataSchema.safeParse(raw);
    if (!parseResult.success) {
      throw createSyncError(
        'INVALID_DATA',
        `Invalid sentence data: ${formatIssues(parseResult.error)}`,
        this.sourcePath
      );
    }
    return parseResult.data;
  }
}
