import type { KnownSet, KnownSetLoadResult } from '../../models/KnownSet';

/**
 * Persistence for the known SKU snapshot.
 *
 * `load` reports a store that holds nothing yet as a first run. It throws
 * `StorageUnavailable` when the medium cannot be read and `StorageCorrupt`
 * when its content cannot be trusted. `save` replaces the stored snapshot in
 * one step or leaves it untouched.
 */
export interface KnownSetStore {
  describe(): string;
  load(): Promise<KnownSetLoadResult>;
  save(knownSet: KnownSet): Promise<void>;
}
