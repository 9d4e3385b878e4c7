import { ClassificationEnum } from '../models/ExportRecord';

/**
 * Columns of the import file, in order. The importer matches on these titles;
 * renaming or reordering them breaks the import.
 */
export const EXPORT_COLUMNS = [
  { id: 'sku', title: 'Variant SKU' },
  { id: 'command', title: 'Command' },
  { id: 'title', title: 'Title' },
  { id: 'description', title: 'Body (HTML)' },
  { id: 'price', title: 'Variant Price' },
  { id: 'stock', title: 'Variant Inventory Qty' },
  { id: 'images', title: 'Image Src' },
  { id: 'category', title: 'Type' },
  { id: 'status', title: 'Status' },
] as const;

export type ExportColumnId = (typeof EXPORT_COLUMNS)[number]['id'];

export type ExportRow = Record<ExportColumnId, string>;

export const IMPORT_COMMANDS: Record<ClassificationEnum, string> = {
  [ClassificationEnum.CREATE]: 'MERGE',
  [ClassificationEnum.UPDATE]: 'UPDATE',
  [ClassificationEnum.ARCHIVE]: 'UPDATE',
};

export const PRODUCT_STATUSES: Record<ClassificationEnum, string> = {
  [ClassificationEnum.CREATE]: 'active',
  [ClassificationEnum.UPDATE]: 'active',
  [ClassificationEnum.ARCHIVE]: 'archived',
};

export const IMAGE_DELIMITER = ';';
