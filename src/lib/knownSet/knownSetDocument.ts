import { z } from 'zod';
import {
  type KnownSet,
  KnownSetLoadStatusEnum,
  type KnownSkuState,
  sortedSkus,
} from '../../models/KnownSet';
import { StorageCorrupt } from '../errors';

export const KNOWN_SET_DOCUMENT_VERSION = 1;

const knownSkuStateSchema = z
  .object({
    seen: z.boolean(),
    discontinued: z.boolean(),
    lastPrice: z.number().finite().nonnegative().optional(),
  })
  .strict();

const knownSetDocumentSchema = z.object({
  version: z.literal(KNOWN_SET_DOCUMENT_VERSION),
  updatedAt: z.string().optional(),
  skus: z.record(knownSkuStateSchema),
});

/** Plain list of SKUs written by the first version of the sync job */
const legacyKnownSetDocumentSchema = z.object({
  skus: z.array(z.string()),
  updated: z.string().optional(),
});

export type KnownSetDocument = z.infer<typeof knownSetDocumentSchema>;

export interface DecodedKnownSet {
  status: KnownSetLoadStatusEnum.LOADED | KnownSetLoadStatusEnum.MIGRATED;
  knownSet: KnownSet;
}

export function encodeKnownSet(knownSet: KnownSet, updatedAt: Date): string {
  const skus: Record<string, KnownSkuState> = {};

  for (const sku of sortedSkus(knownSet)) {
    const state = knownSet.get(sku);
    if (!state) continue;

    skus[sku] = toPlainState(state);
  }

  const document: KnownSetDocument = {
    version: KNOWN_SET_DOCUMENT_VERSION,
    updatedAt: updatedAt.toISOString(),
    skus,
  };

  return `${JSON.stringify(document, null, 2)}\n`;
}

export function decodeKnownSet(content: string, source: string): DecodedKnownSet {
  let parsed: unknown;

  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new StorageCorrupt(`${source} is not valid JSON`, { cause: error });
  }

  const current = knownSetDocumentSchema.safeParse(parsed);

  if (current.success) {
    const knownSet: KnownSet = new Map();

    for (const [sku, state] of Object.entries(current.data.skus)) {
      knownSet.set(sku, toPlainState(state));
    }

    return { status: KnownSetLoadStatusEnum.LOADED, knownSet };
  }

  const legacy = legacyKnownSetDocumentSchema.safeParse(parsed);

  if (legacy.success) {
    const knownSet: KnownSet = new Map();

    for (const sku of legacy.data.skus) {
      const trimmed = sku.trim();
      if (trimmed) knownSet.set(trimmed, { seen: true, discontinued: false });
    }

    return { status: KnownSetLoadStatusEnum.MIGRATED, knownSet };
  }

  throw new StorageCorrupt(
    `${source} does not match the known SKU layout: ${current.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
      .join('; ')}`
  );
}

export function toPlainState(state: KnownSkuState): KnownSkuState {
  return state.lastPrice === undefined
    ? { seen: state.seen, discontinued: state.discontinued }
    : {
        seen: state.seen,
        discontinued: state.discontinued,
        lastPrice: state.lastPrice,
      };
}
