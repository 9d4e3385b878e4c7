import logger from 'node-color-log';
import {
  ATTRIBUTE_COLUMNS,
  AVAILABILITY_COLUMNS,
  PRICING_COLUMNS,
  PRODUCT_COLUMNS,
} from '../../constants/feedColumns';
import type { RawFeedRow } from '../../models/FeedProduct';
import { TransportFailure, errorMessage } from '../errors';
import parseCsv, { type CsvRecord } from '../utils/parseCsv';

export interface FeedFiles {
  productsFile: string;
  pricingFile?: string;
  availabilityFile?: string;
}

/**
 * Reads the supplier's product, pricing and availability exports and joins
 * them by SKU into raw feed rows.
 */
export async function readFeedFiles({
  productsFile,
  pricingFile,
  availabilityFile,
}: FeedFiles): Promise<RawFeedRow[]> {
  const products = await readCsv(productsFile);
  logger.info(`Loaded ${products.length} product rows from ${productsFile}`);

  const pricing = pricingFile
    ? indexBySku(await readCsv(pricingFile), PRICING_COLUMNS.sku)
    : new Map<string, CsvRecord>();
  if (pricingFile) {
    logger.info(`Loaded ${pricing.size} pricing records from ${pricingFile}`);
  }

  const availability = availabilityFile
    ? indexBySku(await readCsv(availabilityFile), AVAILABILITY_COLUMNS.sku)
    : new Map<string, CsvRecord>();
  if (availabilityFile) {
    logger.info(
      `Loaded ${availability.size} stock records from ${availabilityFile}`
    );
  }

  return products.map((product) => toRawFeedRow(product, pricing, availability));
}

export function toRawFeedRow(
  product: CsvRecord,
  pricing: ReadonlyMap<string, CsvRecord>,
  availability: ReadonlyMap<string, CsvRecord>
): RawFeedRow {
  const sku = (product[PRODUCT_COLUMNS.sku] ?? '').trim();
  const imageRef = (product[PRODUCT_COLUMNS.imageRef] ?? '').trim();

  const row: RawFeedRow = {
    sku,
    title: product[PRODUCT_COLUMNS.title],
    description: product[PRODUCT_COLUMNS.description],
    price: pickPrice(
      pricing.get(sku)?.[PRICING_COLUMNS.rrp],
      product[PRODUCT_COLUMNS.listPrice]
    ),
    stock: availability.get(sku)?.[AVAILABILITY_COLUMNS.stock],
    images: imageRef || sku,
    category: product[PRODUCT_COLUMNS.category],
    discontinued: product[PRODUCT_COLUMNS.discontinued],
  };

  for (const [attribute, column] of Object.entries(ATTRIBUTE_COLUMNS)) {
    const value = product[column];

    if (value !== undefined && value.trim() !== '') {
      row[attribute] = value;
    }
  }

  return row;
}

/** The pricing file wins unless its RRP is blank or zero */
function pickPrice(
  pricingRrp: string | undefined,
  listPrice: string | undefined
): string | undefined {
  const rrp = (pricingRrp ?? '').trim();

  if (rrp && Number(rrp) !== 0) {
    return rrp;
  }

  return listPrice;
}

function indexBySku(records: CsvRecord[], skuColumn: string) {
  const index = new Map<string, CsvRecord>();

  for (const record of records) {
    const sku = (record[skuColumn] ?? '').trim();

    if (sku) index.set(sku, record);
  }

  return index;
}

async function readCsv(pathName: string): Promise<CsvRecord[]> {
  try {
    return await parseCsv(pathName);
  } catch (error) {
    throw new TransportFailure(
      `Could not read feed file ${pathName}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}
