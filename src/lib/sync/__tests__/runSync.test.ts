import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import runSync, { type SyncDependencies } from '../runSync';
import type { RawFeedRow } from '../../../models/FeedProduct';
import {
  type KnownSet,
  type KnownSetLoadResult,
  KnownSetLoadStatusEnum,
  cloneKnownSet,
  emptyKnownSet,
} from '../../../models/KnownSet';
import { RunStatusEnum } from '../../../models/RunSummary';
import {
  FeedRowInvalidReasonEnum,
  StorageCorrupt,
  StorageUnavailable,
  SyncErrorCodeEnum,
} from '../../errors';
import type { KnownSetStore } from '../../knownSet/KnownSetStore';
import { FileKnownSetStore } from '../../knownSet/FileKnownSetStore';
import { ReactivationPolicyEnum } from '../../reconcile/reconcile';

const HEADER =
  'Variant SKU,Command,Title,Body (HTML),Variant Price,Variant Inventory Qty,Image Src,Type,Status\n';

class MemoryKnownSetStore implements KnownSetStore {
  saves: KnownSet[] = [];
  loadError: Error | null = null;
  saveError: Error | null = null;

  constructor(private stored: KnownSet | null) {}

  describe(): string {
    return 'memory';
  }

  async load(): Promise<KnownSetLoadResult> {
    if (this.loadError) throw this.loadError;

    if (!this.stored) {
      return { status: KnownSetLoadStatusEnum.FIRST_RUN, knownSet: emptyKnownSet() };
    }

    return {
      status: KnownSetLoadStatusEnum.LOADED,
      knownSet: cloneKnownSet(this.stored),
    };
  }

  async save(knownSet: KnownSet): Promise<void> {
    if (this.saveError) throw this.saveError;

    this.saves.push(knownSet);
    this.stored = cloneKnownSet(knownSet);
  }
}

function feedRow(sku: string, price: string, title: string, category: string): RawFeedRow {
  return {
    sku,
    title,
    description: `<p>${title}</p>`,
    price,
    stock: '2',
    images: '',
    category,
  };
}

function known(...skus: string[]): KnownSet {
  return new Map(skus.map((sku) => [sku, { seen: true, discontinued: false }]));
}

describe('runSync', () => {
  let dir: string;
  let artifactPath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'run-sync-'));
    artifactPath = path.join(dir, 'output', 'product_import.csv');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function dependencies(
    rows: RawFeedRow[],
    store: KnownSetStore,
    overrides: Partial<SyncDependencies> = {}
  ): SyncDependencies {
    return {
      readRows: async () => rows,
      store,
      artifactPath,
      reconcileOptions: { reactivationPolicy: ReactivationPolicyEnum.UPDATE },
      ...overrides,
    };
  }

  it('creates, updates and archives against the stored SKUs', async () => {
    const store = new MemoryKnownSetStore(known('A', 'B'));

    const outcome = await runSync(
      dependencies(
        [feedRow('B', '10', 'Saw', 'Saws'), feedRow('C', '20', 'Chisel', 'Chisels')],
        store
      )
    );

    expect(outcome.status).toBe(RunStatusEnum.SUCCEEDED);
    expect(await fs.readFile(artifactPath, 'utf-8')).toBe(
      HEADER +
        'C,MERGE,Chisel,<p>Chisel</p>,20.00,2,,Chisels,active\n' +
        'B,UPDATE,Saw,<p>Saw</p>,,2,,Saws,active\n' +
        'A,UPDATE,,,,,,,archived\n'
    );
    expect(store.saves).toEqual([
      new Map([
        ['A', { seen: true, discontinued: true }],
        ['B', { seen: true, discontinued: false }],
        ['C', { seen: true, discontinued: false, lastPrice: 20 }],
      ]),
    ]);
    expect(outcome.summary).toMatchObject({
      rowsRead: 2,
      created: 1,
      updated: 1,
      archived: 1,
      parseFailures: 0,
    });
  });

  it('creates everything on a first run', async () => {
    const store = new MemoryKnownSetStore(null);

    const outcome = await runSync(
      dependencies([feedRow('X', '5', 'Vice', 'Clamps')], store)
    );

    expect(outcome.status).toBe(RunStatusEnum.SUCCEEDED);
    expect(await fs.readFile(artifactPath, 'utf-8')).toBe(
      HEADER + 'X,MERGE,Vice,<p>Vice</p>,5.00,2,,Clamps,active\n'
    );
    expect(store.saves).toEqual([
      new Map([['X', { seen: true, discontinued: false, lastPrice: 5 }]]),
    ]);
  });

  it('skips a row with a bad price and still succeeds', async () => {
    const store = new MemoryKnownSetStore(null);

    const outcome = await runSync(
      dependencies(
        [feedRow('X', '5', 'Vice', 'Clamps'), feedRow('Y', 'TBC', 'Level', 'Levels')],
        store
      )
    );

    expect(outcome.status).toBe(RunStatusEnum.SUCCEEDED);
    expect(outcome.summary.parseFailures).toBe(1);
    expect(outcome.summary.failures).toEqual([
      {
        row: 2,
        sku: 'Y',
        reason: FeedRowInvalidReasonEnum.INVALID_PRICE,
        message: 'SKU Y has an invalid price "TBC"',
      },
    ]);
    expect(outcome.summary.created).toBe(1);
    expect(store.saves[0].has('Y')).toBe(false);
    expect(await fs.readFile(artifactPath, 'utf-8')).toBe(
      HEADER + 'X,MERGE,Vice,<p>Vice</p>,5.00,2,,Clamps,active\n'
    );
  });

  it('sends no creates, archives or prices when re-run with the same feed', async () => {
    const store = new FileKnownSetStore({ filePath: path.join(dir, 'known.json') });
    const rows = [feedRow('B', '10', 'Saw', 'Saws'), feedRow('C', '20', 'Chisel', 'Chisels')];

    await runSync(dependencies(rows, store));
    const second = await runSync(dependencies(rows, store));

    expect(second.summary).toMatchObject({ created: 0, updated: 2, archived: 0 });
    expect(await fs.readFile(artifactPath, 'utf-8')).toBe(
      HEADER +
        'B,UPDATE,Saw,<p>Saw</p>,,2,,Saws,active\n' +
        'C,UPDATE,Chisel,<p>Chisel</p>,,2,,Chisels,active\n'
    );
  });

  it('writes byte-identical files for identical inputs', async () => {
    const rows = [
      feedRow('B', '10', 'Saw, "panel"', 'Saws'),
      feedRow('C', '20.5', 'Chisel', 'Chisels'),
    ];
    const otherPath = path.join(dir, 'other', 'product_import.csv');

    await runSync(dependencies(rows, new MemoryKnownSetStore(known('A', 'B'))));
    await runSync(
      dependencies(rows, new MemoryKnownSetStore(known('A', 'B')), {
        artifactPath: otherPath,
      })
    );

    expect(await fs.readFile(otherPath)).toEqual(await fs.readFile(artifactPath));
  });

  it('publishes nothing when the snapshot cannot be saved', async () => {
    const store = new MemoryKnownSetStore(known('A'));
    store.saveError = new StorageUnavailable('disk full');

    const outcome = await runSync(
      dependencies([feedRow('B', '10', 'Saw', 'Saws')], store)
    );

    expect(outcome.status).toBe(RunStatusEnum.FAILED);
    if (outcome.status !== RunStatusEnum.FAILED) return;
    expect(outcome.errorCode).toBe(SyncErrorCodeEnum.STORAGE_UNAVAILABLE);
    expect(outcome.summary).toMatchObject({ created: 0, updated: 0, archived: 0 });
    expect(await fs.readdir(path.join(dir, 'output'))).toEqual([]);
  });

  it('stops before reconciling when the snapshot is corrupt', async () => {
    const store = new MemoryKnownSetStore(known('A'));
    store.loadError = new StorageCorrupt('known.json is not valid JSON');

    const outcome = await runSync(
      dependencies([feedRow('B', '10', 'Saw', 'Saws')], store)
    );

    expect(outcome.status).toBe(RunStatusEnum.FAILED);
    if (outcome.status !== RunStatusEnum.FAILED) return;
    expect(outcome.errorCode).toBe(SyncErrorCodeEnum.STORAGE_CORRUPT);
    expect(store.saves).toEqual([]);
    await expect(fs.access(artifactPath)).rejects.toThrow();
  });

  it('reports a feed that cannot be read as a transport failure', async () => {
    const store = new MemoryKnownSetStore(known('A'));

    const outcome = await runSync(
      dependencies([], store, {
        readRows: async () => {
          throw new Error('connection reset');
        },
      })
    );

    expect(outcome.status).toBe(RunStatusEnum.FAILED);
    if (outcome.status !== RunStatusEnum.FAILED) return;
    expect(outcome.errorCode).toBe(SyncErrorCodeEnum.TRANSPORT_FAILURE);
    expect(outcome.error.message).toBe('Feed could not be read: connection reset');
    expect(store.saves).toEqual([]);
  });

  it('fails the run when a record cannot be rendered', async () => {
    const store = new MemoryKnownSetStore(null);
    const row = { ...feedRow('X', '5', 'Vice', 'Clamps'), images: 'front.jpg;back.jpg' };

    const outcome = await runSync(dependencies([row], store));

    expect(outcome.status).toBe(RunStatusEnum.FAILED);
    if (outcome.status !== RunStatusEnum.FAILED) return;
    expect(outcome.errorCode).toBe(SyncErrorCodeEnum.SERIALIZATION_FAILURE);
    expect(store.saves).toEqual([]);
  });

  describe('archive guard', () => {
    it('aborts when too many known SKUs would be archived', async () => {
      const store = new MemoryKnownSetStore(known('A', 'B', 'C', 'D'));

      const outcome = await runSync(
        dependencies([feedRow('A', '1', 'Axe', 'Axes')], store, {
          archiveGuardRatio: 0.5,
        })
      );

      expect(outcome.status).toBe(RunStatusEnum.FAILED);
      if (outcome.status !== RunStatusEnum.FAILED) return;
      expect(outcome.errorCode).toBe(SyncErrorCodeEnum.PARTIAL_FEED_SUSPECTED);
      expect(outcome.error.message).toBe(
        'Feed would archive 3 of 4 active SKUs, above the allowed ratio of 0.5'
      );
      expect(store.saves).toEqual([]);
    });

    it('archives everything when the guard is off', async () => {
      const store = new MemoryKnownSetStore(known('A', 'B'));

      const outcome = await runSync(dependencies([], store));

      expect(outcome.status).toBe(RunStatusEnum.SUCCEEDED);
      expect(outcome.summary.archived).toBe(2);
    });
  });
});
