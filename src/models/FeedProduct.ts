/**
 * A row handed over by the transport, keyed by logical field name.
 * Keys other than the known fields are kept as product attributes.
 */
export type RawFeedRow = Record<string, string | undefined>;

export const RAW_FEED_FIELDS = [
  'sku',
  'title',
  'description',
  'price',
  'stock',
  'images',
  'category',
  'discontinued',
] as const;

export type RawFeedField = (typeof RAW_FEED_FIELDS)[number];

export interface FeedProduct {
  sku: string;
  title: string;
  description: string;
  /** Recommended retail price from the supplier */
  price: number;
  stock: number;
  images: string[];
  category: string;
  /** Supplier flagged the product as discontinued */
  discontinued: boolean;
  attributes: Record<string, string>;
}
