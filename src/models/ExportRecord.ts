export enum ClassificationEnum {
  CREATE = 'CREATE',
  UPDATE = 'UPDATE',
  ARCHIVE = 'ARCHIVE',
}

export interface ProductDetails {
  title: string;
  description: string;
  stock: number;
  images: string[];
  category: string;
}

export interface CreateRecord {
  classification: ClassificationEnum.CREATE;
  sku: string;
  details: ProductDetails;
  price: number;
}

/** Carries no price: a price is only ever sent when the product is created */
export interface UpdateRecord {
  classification: ClassificationEnum.UPDATE;
  sku: string;
  details: ProductDetails;
}

export interface ArchiveRecord {
  classification: ClassificationEnum.ARCHIVE;
  sku: string;
}

export type ExportRecord = CreateRecord | UpdateRecord | ArchiveRecord;
