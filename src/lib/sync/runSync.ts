import logger from 'node-color-log';
import type { RawFeedRow } from '../../models/FeedProduct';
import { KnownSetLoadStatusEnum } from '../../models/KnownSet';
import {
  RunStatusEnum,
  type RunSummary,
  emptyRunSummary,
} from '../../models/RunSummary';
import {
  PartialFeedSuspected,
  SerializationFailure,
  SyncError,
  SyncErrorCodeEnum,
  TransportFailure,
  errorMessage,
} from '../errors';
import { serializeExport, writeExportFile } from '../export/serializeExport';
import { type FeedParseOptions, collectFeed } from '../feed/parseFeedRecords';
import type { KnownSetStore } from '../knownSet/KnownSetStore';
import { type ReconcileOptions, reconcile } from '../reconcile/reconcile';

export interface SyncDependencies {
  /** Transport: hands over the raw rows of one feed snapshot */
  readRows: () => Promise<Iterable<RawFeedRow>>;
  store: KnownSetStore;
  artifactPath: string;
  parseOptions?: FeedParseOptions;
  reconcileOptions: ReconcileOptions;
  /**
   * Abort when more than this share of the known active SKUs would be
   * archived. 1 disables the check.
   */
  archiveGuardRatio?: number;
}

export type SyncOutcome =
  | {
      status: RunStatusEnum.SUCCEEDED;
      summary: RunSummary;
      artifactPath: string;
    }
  | {
      status: RunStatusEnum.FAILED;
      summary: RunSummary;
      errorCode: SyncErrorCodeEnum;
      error: Error;
    };

export default async function runSync({
  readRows,
  store,
  artifactPath,
  parseOptions = {},
  reconcileOptions,
  archiveGuardRatio = 1,
}: SyncDependencies): Promise<SyncOutcome> {
  const summary = emptyRunSummary();

  try {
    logger.info('Reading feed...');
    let rows: Iterable<RawFeedRow>;
    try {
      rows = await readRows();
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new TransportFailure(`Feed could not be read: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const feed = collectFeed(rows, parseOptions);
    summary.rowsRead = feed.rowsRead;
    summary.parseFailures = feed.failures.length;
    summary.failures = feed.failures.map(({ row, sku, reason, message }) => ({
      row,
      sku,
      reason,
      message,
    }));

    feed.failures.forEach((failure) => {
      logger.warn(`Skipped row ${failure.row}: ${failure.message}`);
    });
    logger.info(
      `Parsed ${feed.products.length} of ${feed.rowsRead} feed rows (${feed.failures.length} skipped)`
    );

    logger.info(`Loading known SKUs from ${store.describe()}...`);
    const loaded = await store.load();
    if (loaded.status === KnownSetLoadStatusEnum.FIRST_RUN) {
      logger.warn('No known SKUs stored yet; every product in the feed is new');
    } else if (loaded.status === KnownSetLoadStatusEnum.MIGRATED) {
      logger.warn('Known SKUs were stored in the old list layout; migrating');
    }
    logger.info(`Known SKUs: ${loaded.knownSet.size}`);

    const result = reconcile(feed.products, loaded.knownSet, reconcileOptions);
    const { created, updated, archived, reactivated, flaggedDiscontinued } =
      result.counts;

    logger.info(
      `Classified: ${created} new, ${updated} existing, ${archived} archived, ${reactivated} reactivated, ${flaggedDiscontinued} flagged discontinued`
    );

    const knownActive = [...loaded.knownSet.values()].filter(
      (state) => !state.discontinued
    ).length;

    if (
      archiveGuardRatio < 1 &&
      knownActive > 0 &&
      archived / knownActive > archiveGuardRatio
    ) {
      throw new PartialFeedSuspected(
        `Feed would archive ${archived} of ${knownActive} active SKUs, above the allowed ratio of ${archiveGuardRatio}`
      );
    }

    const content = serializeExport(result.records);
    const staged = await writeExportFile(artifactPath, content);

    try {
      await store.save(result.knownSet);
    } catch (error) {
      await staged.discard();
      throw error;
    }

    try {
      await staged.commit();
    } catch (error) {
      // Put the previous snapshot back so the next run sends these rows again
      await store.save(loaded.knownSet);
      throw new SerializationFailure(
        `Could not publish ${artifactPath}: ${errorMessage(error)}`,
        { cause: error }
      );
    }
    logger.success(`Wrote ${result.records.length} rows to ${artifactPath}`);

    summary.created = created;
    summary.updated = updated;
    summary.archived = archived;
    summary.reactivated = reactivated;
    summary.flaggedDiscontinued = flaggedDiscontinued;

    return { status: RunStatusEnum.SUCCEEDED, summary, artifactPath };
  } catch (error) {
    const errorCode =
      error instanceof SyncError ? error.code : SyncErrorCodeEnum.UNEXPECTED_ERROR;

    logger.error(`Sync failed [${errorCode}]: ${errorMessage(error)}`);

    return {
      status: RunStatusEnum.FAILED,
      summary,
      errorCode,
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
