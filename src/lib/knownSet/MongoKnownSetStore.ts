import logger from 'node-color-log';
import { z } from 'zod';
import {
  type KnownSet,
  type KnownSetLoadResult,
  KnownSetLoadStatusEnum,
  emptyKnownSet,
  sortedSkus,
} from '../../models/KnownSet';
import {
  type KnownSetSnapshotEntry,
  MKnownSetSnapshot,
} from '../../models/KnownSetSnapshot';
import { StorageCorrupt, StorageUnavailable, errorMessage } from '../errors';
import type { KnownSetStore } from './KnownSetStore';
import { toPlainState } from './knownSetDocument';

const snapshotEntrySchema = z.object({
  sku: z.string().min(1),
  seen: z.boolean(),
  discontinued: z.boolean(),
  lastPrice: z.number().finite().nonnegative().nullish(),
});

const snapshotSchema = z.object({
  entries: z.array(snapshotEntrySchema),
});

export interface MongoKnownSetStoreOptions {
  name: string;
  now?: () => Date;
}

/**
 * Keeps the snapshot in a single document, so each save is one atomic
 * document replacement.
 */
export class MongoKnownSetStore implements KnownSetStore {
  private readonly name: string;
  private readonly now: () => Date;

  constructor({ name, now = () => new Date() }: MongoKnownSetStoreOptions) {
    this.name = name;
    this.now = now;
  }

  describe(): string {
    return `mongo snapshot "${this.name}"`;
  }

  async load(): Promise<KnownSetLoadResult> {
    let document: unknown;

    try {
      document = await MKnownSetSnapshot.findOne({ name: this.name }).lean();
    } catch (error) {
      throw new StorageUnavailable(
        `Could not read ${this.describe()}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    if (!document) {
      logger.info(`No ${this.describe()} stored yet, starting empty`);
      return {
        status: KnownSetLoadStatusEnum.FIRST_RUN,
        knownSet: emptyKnownSet(),
      };
    }

    const parsed = snapshotSchema.safeParse(document);

    if (!parsed.success) {
      throw new StorageCorrupt(
        `${this.describe()} is malformed: ${parsed.error.issues
          .map((issue) => `${issue.path.join('.')} ${issue.message}`)
          .join('; ')}`
      );
    }

    const knownSet: KnownSet = new Map();

    for (const { sku, seen, discontinued, lastPrice } of parsed.data.entries) {
      if (knownSet.has(sku)) {
        throw new StorageCorrupt(`${this.describe()} lists SKU ${sku} twice`);
      }

      knownSet.set(
        sku,
        toPlainState({ seen, discontinued, lastPrice: lastPrice ?? undefined })
      );
    }

    return { status: KnownSetLoadStatusEnum.LOADED, knownSet };
  }

  async save(knownSet: KnownSet): Promise<void> {
    const entries: KnownSetSnapshotEntry[] = [];

    for (const sku of sortedSkus(knownSet)) {
      const state = knownSet.get(sku);
      if (!state) continue;

      entries.push({ sku, ...toPlainState(state) });
    }

    try {
      await MKnownSetSnapshot.replaceOne(
        { name: this.name },
        { name: this.name, entries, updatedAt: this.now() },
        { upsert: true }
      );
    } catch (error) {
      throw new StorageUnavailable(
        `Could not write ${this.describe()}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    logger.success(`Saved ${entries.length} known SKUs to ${this.describe()}`);
  }
}
