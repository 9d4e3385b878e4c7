import { promises as fs } from 'fs';
import logger from 'node-color-log';
import {
  type KnownSet,
  type KnownSetLoadResult,
  KnownSetLoadStatusEnum,
  emptyKnownSet,
} from '../../models/KnownSet';
import { StorageUnavailable, errorMessage, isNodeError } from '../errors';
import writeFileAtomic from '../utils/writeFileAtomic';
import type { KnownSetStore } from './KnownSetStore';
import { decodeKnownSet, encodeKnownSet } from './knownSetDocument';

export interface FileKnownSetStoreOptions {
  filePath: string;
  now?: () => Date;
}

export class FileKnownSetStore implements KnownSetStore {
  private readonly filePath: string;
  private readonly now: () => Date;

  constructor({ filePath, now = () => new Date() }: FileKnownSetStoreOptions) {
    this.filePath = filePath;
    this.now = now;
  }

  describe(): string {
    return `file ${this.filePath}`;
  }

  async load(): Promise<KnownSetLoadResult> {
    let content: string;

    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        logger.info(`No known SKU file at ${this.filePath}, starting empty`);
        return {
          status: KnownSetLoadStatusEnum.FIRST_RUN,
          knownSet: emptyKnownSet(),
        };
      }

      throw new StorageUnavailable(
        `Could not read ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return decodeKnownSet(content, this.filePath);
  }

  async save(knownSet: KnownSet): Promise<void> {
    try {
      await writeFileAtomic(this.filePath, encodeKnownSet(knownSet, this.now()));
    } catch (error) {
      throw new StorageUnavailable(
        `Could not write ${this.filePath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    logger.success(`Saved ${knownSet.size} known SKUs to ${this.filePath}`);
  }
}
