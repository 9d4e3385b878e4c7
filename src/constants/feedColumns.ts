/** Column names of the supplier's product data export */
export const PRODUCT_COLUMNS = {
  sku: 'StockCode',
  title: 'Product Name',
  description: 'ProductDescription',
  listPrice: 'CurrentListPrice',
  imageRef: 'ImageRef',
  category: 'ClassBName',
  discontinued: 'DiscontinuedFlag',
} as const;

/** Supplier columns carried over as product attributes */
export const ATTRIBUTE_COLUMNS = {
  vendor: 'Brand_Name',
  barcode: 'RetailerBarcode',
  brandPartNumber: 'BrandPartNumber',
  weight: 'Weight',
} as const;

export const PRICING_COLUMNS = {
  sku: 'stock_no',
  rrp: 'rrp',
} as const;

export const AVAILABILITY_COLUMNS = {
  sku: 'stock_no',
  stock: 'cstock',
} as const;
