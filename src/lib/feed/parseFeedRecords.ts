import { minify } from 'html-minifier';
import { type FeedProduct, RAW_FEED_FIELDS, type RawFeedRow } from '../../models/FeedProduct';
import { FeedRowInvalid, FeedRowInvalidReasonEnum } from '../errors';

export interface FeedParseOptions {
  /** Prefix for image references that are not absolute URLs */
  imageBaseUrl?: string;
  minifyDescription?: boolean;
}

export type FeedParseOutcome =
  | { ok: true; product: FeedProduct }
  | { ok: false; failure: FeedRowInvalid };

export interface CollectedFeed {
  products: FeedProduct[];
  failures: FeedRowInvalid[];
  rowsRead: number;
}

const PRICE_PATTERN = /^\d+(\.\d+)?$/;
const STOCK_PATTERN = /^-?\d+(\.\d+)?$/;
const ABSOLUTE_URL_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;
const FILE_EXTENSION_PATTERN = /\.[a-z0-9]{2,5}$/i;
const TRUTHY_FLAGS = ['1', 'true', 'yes', 'y'];
const IMAGE_SEPARATOR = '|';

const knownFields: ReadonlySet<string> = new Set(RAW_FEED_FIELDS);

/**
 * Turns raw feed rows into products, one outcome per row.
 *
 * The returned generator is single-pass. A row that fails validation yields a
 * tagged failure and parsing carries on with the next row.
 */
export function* parseFeedRecords(
  rows: Iterable<RawFeedRow>,
  options: FeedParseOptions = {}
): Generator<FeedParseOutcome, void, undefined> {
  const seenSkus = new Set<string>();
  let rowNumber = 0;

  for (const row of rows) {
    rowNumber++;

    const outcome = parseRow(row, rowNumber, options);

    if (outcome.ok) {
      const { sku } = outcome.product;

      if (seenSkus.has(sku)) {
        yield {
          ok: false,
          failure: new FeedRowInvalid(
            rowNumber,
            FeedRowInvalidReasonEnum.DUPLICATE_SKU,
            `SKU ${sku} already appeared earlier in the feed`,
            sku
          ),
        };
        continue;
      }

      seenSkus.add(sku);
    }

    yield outcome;
  }
}

export function collectFeed(
  rows: Iterable<RawFeedRow>,
  options: FeedParseOptions = {}
): CollectedFeed {
  const products: FeedProduct[] = [];
  const failures: FeedRowInvalid[] = [];

  for (const outcome of parseFeedRecords(rows, options)) {
    if (outcome.ok) {
      products.push(outcome.product);
    } else {
      failures.push(outcome.failure);
    }
  }

  return { products, failures, rowsRead: products.length + failures.length };
}

function parseRow(
  row: RawFeedRow,
  rowNumber: number,
  options: FeedParseOptions
): FeedParseOutcome {
  const sku = (row.sku ?? '').trim();

  if (!sku) {
    return invalid(rowNumber, FeedRowInvalidReasonEnum.MISSING_SKU, 'Row has no SKU');
  }

  const rawPrice = (row.price ?? '').trim();

  if (!rawPrice) {
    return invalid(
      rowNumber,
      FeedRowInvalidReasonEnum.MISSING_PRICE,
      `SKU ${sku} has no price`,
      sku
    );
  }

  if (!PRICE_PATTERN.test(rawPrice)) {
    return invalid(
      rowNumber,
      FeedRowInvalidReasonEnum.INVALID_PRICE,
      `SKU ${sku} has an invalid price "${rawPrice}"`,
      sku
    );
  }

  const stock = parseStock(row.stock);

  if (stock === null) {
    return invalid(
      rowNumber,
      FeedRowInvalidReasonEnum.INVALID_STOCK,
      `SKU ${sku} has an invalid stock quantity "${row.stock}"`,
      sku
    );
  }

  const description = row.description ?? '';

  return {
    ok: true,
    product: {
      sku,
      title: (row.title ?? '').trim(),
      description: options.minifyDescription
        ? minifyDescription(description)
        : description,
      price: Number(rawPrice),
      stock,
      images: parseImages(row.images, options.imageBaseUrl),
      category: (row.category ?? '').trim(),
      discontinued: TRUTHY_FLAGS.includes(
        (row.discontinued ?? '').trim().toLowerCase()
      ),
      attributes: extractAttributes(row),
    },
  };
}

function invalid(
  rowNumber: number,
  reason: FeedRowInvalidReasonEnum,
  message: string,
  sku?: string
): FeedParseOutcome {
  return {
    ok: false,
    failure: new FeedRowInvalid(rowNumber, reason, message, sku),
  };
}

function parseStock(raw: string | undefined): number | null {
  const value = (raw ?? '').trim();

  if (!value) return 0;
  if (!STOCK_PATTERN.test(value)) return null;

  return Math.max(0, Math.trunc(Number(value)));
}

export function parseImages(raw: string | undefined, imageBaseUrl = ''): string[] {
  return (raw ?? '')
    .split(IMAGE_SEPARATOR)
    .map((ref) => ref.trim())
    .filter((ref) => ref.length > 0)
    .map((ref) => resolveImageUrl(ref, imageBaseUrl));
}

function resolveImageUrl(ref: string, imageBaseUrl: string): string {
  if (ABSOLUTE_URL_PATTERN.test(ref) || !imageBaseUrl) {
    return ref;
  }

  const fileName = FILE_EXTENSION_PATTERN.test(ref) ? ref : `${ref}.jpg`;

  return `${imageBaseUrl}${fileName}`;
}

function minifyDescription(html: string): string {
  return minify(html, {
    removeTagWhitespace: true,
    collapseWhitespace: true,
    collapseInlineTagWhitespace: true,
  });
}

function extractAttributes(row: RawFeedRow): Record<string, string> {
  const attributes: Record<string, string> = {};

  for (const key of Object.keys(row).sort()) {
    const value = row[key];

    if (knownFields.has(key) || value === undefined) continue;

    attributes[key] = value.trim();
  }

  return attributes;
}
