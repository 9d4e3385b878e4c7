export interface KnownSkuState {
  seen: boolean;
  discontinued: boolean;
  /** Price sent with the CREATE record, if any */
  lastPrice?: number;
}

export type KnownSet = Map<string, KnownSkuState>;

export enum KnownSetLoadStatusEnum {
  FIRST_RUN = 'FIRST_RUN',
  LOADED = 'LOADED',
  MIGRATED = 'MIGRATED',
}

export interface KnownSetLoadResult {
  status: KnownSetLoadStatusEnum;
  knownSet: KnownSet;
}

export interface KnownSetStats {
  total: number;
  active: number;
  discontinued: number;
  priced: number;
}

export function emptyKnownSet(): KnownSet {
  return new Map();
}

export function cloneKnownSet(knownSet: ReadonlyMap<string, KnownSkuState>): KnownSet {
  const clone: KnownSet = new Map();

  knownSet.forEach((state, sku) => {
    clone.set(sku, { ...state });
  });

  return clone;
}

export function compareSku(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function sortedSkus(knownSet: ReadonlyMap<string, KnownSkuState>): string[] {
  return [...knownSet.keys()].sort(compareSku);
}

export function getKnownSetStats(
  knownSet: ReadonlyMap<string, KnownSkuState>
): KnownSetStats {
  let discontinued = 0;
  let priced = 0;

  knownSet.forEach((state) => {
    if (state.discontinued) discontinued++;
    if (state.lastPrice !== undefined) priced++;
  });

  return {
    total: knownSet.size,
    active: knownSet.size - discontinued,
    discontinued,
    priced,
  };
}
