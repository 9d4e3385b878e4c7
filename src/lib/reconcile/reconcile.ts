import type { FeedProduct } from '../../models/FeedProduct';
import {
  type ArchiveRecord,
  ClassificationEnum,
  type CreateRecord,
  type ExportRecord,
  type ProductDetails,
  type UpdateRecord,
} from '../../models/ExportRecord';
import {
  type KnownSet,
  type KnownSkuState,
  cloneKnownSet,
  compareSku,
} from '../../models/KnownSet';

/** What to send for a SKU that was archived and shows up in the feed again */
export enum ReactivationPolicyEnum {
  /** Treat it as a new product, price included */
  CREATE = 'create',
  /** Treat it as an existing product, price left alone */
  UPDATE = 'update',
}

export interface ReconcileOptions {
  reactivationPolicy: ReactivationPolicyEnum;
}

export interface ReconcileCounts {
  created: number;
  updated: number;
  archived: number;
  reactivated: number;
  flaggedDiscontinued: number;
}

export interface ReconcileResult {
  records: ExportRecord[];
  /** Snapshot to persist once the export is safe to publish */
  knownSet: KnownSet;
  counts: ReconcileCounts;
}

/**
 * Classifies every SKU of the feed and of the known snapshot.
 *
 * New SKUs are created with their feed price, SKUs already exported are
 * updated without a price, and known SKUs missing from the feed are archived.
 * Products the supplier flags as discontinued count as missing. The input
 * snapshot is left as it was; the updated one is returned.
 */
export function reconcile(
  products: readonly FeedProduct[],
  knownSet: ReadonlyMap<string, KnownSkuState>,
  { reactivationPolicy }: ReconcileOptions
): ReconcileResult {
  const nextKnownSet = cloneKnownSet(knownSet);

  const current = new Map<string, FeedProduct>();
  let flaggedDiscontinued = 0;

  for (const product of products) {
    if (product.discontinued) {
      flaggedDiscontinued++;
      continue;
    }
    if (!current.has(product.sku)) current.set(product.sku, product);
  }

  const creates: CreateRecord[] = [];
  const updates: UpdateRecord[] = [];
  const archives: ArchiveRecord[] = [];
  let reactivated = 0;

  for (const sku of [...current.keys()].sort(compareSku)) {
    const product = current.get(sku);
    if (!product) continue;

    const state = knownSet.get(sku);

    if (!state) {
      creates.push(toCreateRecord(product));
      nextKnownSet.set(sku, {
        seen: true,
        discontinued: false,
        lastPrice: product.price,
      });
      continue;
    }

    if (state.discontinued) {
      reactivated++;

      if (reactivationPolicy === ReactivationPolicyEnum.CREATE) {
        creates.push(toCreateRecord(product));
        nextKnownSet.set(sku, {
          seen: true,
          discontinued: false,
          lastPrice: product.price,
        });
        continue;
      }

      nextKnownSet.set(sku, { ...state, seen: true, discontinued: false });
    }

    updates.push({
      classification: ClassificationEnum.UPDATE,
      sku,
      details: toDetails(product),
    });
  }

  const missingFromFeed = [...knownSet.entries()]
    .filter(([sku, state]) => !state.discontinued && !current.has(sku))
    .sort(([a], [b]) => compareSku(a, b));

  for (const [sku, state] of missingFromFeed) {
    archives.push({ classification: ClassificationEnum.ARCHIVE, sku });
    nextKnownSet.set(sku, { ...state, seen: true, discontinued: true });
  }

  return {
    records: [...creates, ...updates, ...archives],
    knownSet: nextKnownSet,
    counts: {
      created: creates.length,
      updated: updates.length,
      archived: archives.length,
      reactivated,
      flaggedDiscontinued,
    },
  };
}

function toCreateRecord(product: FeedProduct): CreateRecord {
  return {
    classification: ClassificationEnum.CREATE,
    sku: product.sku,
    details: toDetails(product),
    price: product.price,
  };
}

function toDetails({
  title,
  description,
  stock,
  images,
  category,
}: FeedProduct): ProductDetails {
  return { title, description, stock, images: [...images], category };
}
