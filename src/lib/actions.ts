import mongoose from 'mongoose';
import logger from 'node-color-log';
import config from '../config';
import { getKnownSetStats } from '../models/KnownSet';
import { RunStatusEnum } from '../models/RunSummary';
import { readFeedFiles } from './feed/readFeedFiles';
import { FileKnownSetStore } from './knownSet/FileKnownSetStore';
import type { KnownSetStore } from './knownSet/KnownSetStore';
import { MongoKnownSetStore } from './knownSet/MongoKnownSetStore';
import { ReactivationPolicyEnum } from './reconcile/reconcile';
import runSync from './sync/runSync';

function usesMongo() {
  return config.KNOWN_SET_STORE === 'mongo';
}

function createKnownSetStore(): KnownSetStore {
  if (usesMongo()) {
    return new MongoKnownSetStore({ name: config.KNOWN_SET_NAME });
  }

  return new FileKnownSetStore({ filePath: config.KNOWN_SET_FILE });
}

async function withStore<T>(
  callback: (store: KnownSetStore) => Promise<T>
): Promise<T> {
  if (usesMongo()) {
    if (!config.MONGODB_URI) {
      throw new Error('MONGODB_URI is required when KNOWN_SET_STORE=mongo');
    }

    await mongoose.connect(config.MONGODB_URI);
    logger.success('Connected to Database');
  }

  try {
    return await callback(createKnownSetStore());
  } finally {
    if (usesMongo()) {
      await mongoose.connection.close();
      logger.info('Database connection closed');
    }
  }
}

/** Runs one feed sync; resolves to true when the run succeeded */
export async function runFeedSync(): Promise<boolean> {
  logger.color('blue').bold().log('FEED SYNC');
  logger.info(`Started: ${new Date().toISOString()}`);

  const outcome = await withStore((store) =>
    runSync({
      readRows: () =>
        readFeedFiles({
          productsFile: config.FEED_PRODUCTS_FILE,
          pricingFile: config.FEED_PRICING_FILE || undefined,
          availabilityFile: config.FEED_AVAILABILITY_FILE || undefined,
        }),
      store,
      artifactPath: `${config.OUTPUT_DIR}/${config.EXPORT_FILENAME}`,
      parseOptions: {
        imageBaseUrl: config.IMAGE_BASE_URL,
        minifyDescription: config.MINIFY_DESCRIPTION_HTML,
      },
      reconcileOptions: {
        reactivationPolicy:
          config.REACTIVATION_POLICY === 'create'
            ? ReactivationPolicyEnum.CREATE
            : ReactivationPolicyEnum.UPDATE,
      },
      archiveGuardRatio: config.ARCHIVE_GUARD_RATIO,
    })
  );

  const { summary } = outcome;
  logger.info(
    `Created: ${summary.created} | Updated: ${summary.updated} | Archived: ${summary.archived} | Parse failures: ${summary.parseFailures}`
  );

  if (outcome.status === RunStatusEnum.FAILED) {
    logger.error(`SYNC FAILED: ${outcome.error.message}`);
    return false;
  }

  logger.success(`SYNC COMPLETE. Output file: ${outcome.artifactPath}`);
  return true;
}

export async function showKnownSetSummary(): Promise<boolean> {
  const { status, knownSet } = await withStore((store) => store.load());
  const stats = getKnownSetStats(knownSet);

  logger.info(`Snapshot status: ${status}`);
  logger.info(
    `Known SKUs: ${stats.total} | Active: ${stats.active} | Archived: ${stats.discontinued} | Priced: ${stats.priced}`
  );

  return true;
}
