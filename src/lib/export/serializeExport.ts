import { createObjectCsvStringifier } from 'csv-writer';
import {
  EXPORT_COLUMNS,
  type ExportRow,
  IMAGE_DELIMITER,
  IMPORT_COMMANDS,
  PRODUCT_STATUSES,
} from '../../constants/exportColumns';
import { ClassificationEnum, type ExportRecord } from '../../models/ExportRecord';
import { SerializationFailure, errorMessage } from '../errors';
import { type StagedFile, stageFile } from '../utils/writeFileAtomic';

/**
 * Renders records as the import CSV: header row, then one row per record in
 * the order given. The same records always produce the same text.
 */
export function serializeExport(records: readonly ExportRecord[]): string {
  validateRecords(records);

  const stringifier = createObjectCsvStringifier({
    header: EXPORT_COLUMNS.map(({ id, title }) => ({ id, title })),
  });

  const header = stringifier.getHeaderString();

  if (header === null) {
    throw new SerializationFailure('Export header could not be rendered');
  }

  if (records.length === 0) {
    return header;
  }

  return header + stringifier.stringifyRecords(records.map(toExportRow));
}

/** Stages the export beside its final path; call `commit` to publish it */
export async function writeExportFile(
  targetPath: string,
  content: string
): Promise<StagedFile> {
  try {
    return await stageFile(targetPath, content);
  } catch (error) {
    throw new SerializationFailure(
      `Could not stage export file ${targetPath}: ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

export function toExportRow(record: ExportRecord): ExportRow {
  const row: ExportRow = {
    sku: record.sku,
    command: IMPORT_COMMANDS[record.classification],
    title: '',
    description: '',
    price: '',
    stock: '',
    images: '',
    category: '',
    status: PRODUCT_STATUSES[record.classification],
  };

  if (record.classification === ClassificationEnum.ARCHIVE) {
    return row;
  }

  const { title, description, stock, images, category } = record.details;

  row.title = title;
  row.description = description;
  row.stock = String(stock);
  row.images = images.join(IMAGE_DELIMITER);
  row.category = category;

  if (record.classification === ClassificationEnum.CREATE) {
    row.price = record.price.toFixed(2);
  }

  return row;
}

export function validateRecords(records: readonly ExportRecord[]): void {
  const skus = new Set<string>();

  for (const record of records) {
    const { sku } = record;

    if (!sku.trim()) {
      throw new SerializationFailure('Export record without a SKU');
    }

    if (skus.has(sku)) {
      throw new SerializationFailure(`SKU ${sku} appears twice in the export`, {
        sku,
      });
    }
    skus.add(sku);

    if (record.classification === ClassificationEnum.ARCHIVE) continue;

    if (
      record.classification === ClassificationEnum.CREATE &&
      !(Number.isFinite(record.price) && record.price >= 0)
    ) {
      throw new SerializationFailure(
        `SKU ${sku} has an unusable price ${record.price}`,
        { sku }
      );
    }

    const { stock, images } = record.details;

    if (!Number.isInteger(stock) || stock < 0) {
      throw new SerializationFailure(
        `SKU ${sku} has an unusable stock quantity ${stock}`,
        { sku }
      );
    }

    const badImage = images.find((image) => image.includes(IMAGE_DELIMITER));

    if (badImage !== undefined) {
      throw new SerializationFailure(
        `SKU ${sku} has an image reference containing "${IMAGE_DELIMITER}": ${badImage}`,
        { sku }
      );
    }
  }
}
