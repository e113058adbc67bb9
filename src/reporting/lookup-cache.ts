import { type GeographySource, NAME_LOOKUP } from '../constants';
import { attempt, valueOr } from '../errors';
import Logger from '../logger';
import type { RecordStore } from '../types';

/** Geography list stored for an entity with no resolvable region */
const NO_GEOGRAPHY: readonly string[] = [''];

/**
 * Per-pass memoization of related-record names and geography lists.
 *
 * Entries are keyed by the referenced record's id. A pass covers one seed user,
 * its subordinates and its management chain; the orchestrator calls reset()
 * before each pass so results never carry over between seeds.
 */
class LookupCache {
  private store: RecordStore;
  private names = new Map<string, string>();
  private geographies = new Map<string, readonly string[]>();

  constructor(store: RecordStore) {
    this.store = store;
  }

  get size(): { names: number; geographies: number } {
    return { names: this.names.size, geographies: this.geographies.size };
  }

  reset(): void {
    this.names.clear();
    this.geographies.clear();
  }

  /**
   * Display name of a related record. Empty string for an absent reference or
   * a failed fetch; failures are not cached, so a later call retries.
   */
  async resolveName(entity: string, ref: string | null, fieldName: string): Promise<string> {
    if (!ref) return '';
    const cached = this.names.get(ref);
    if (cached !== undefined) return cached;

    const result = await attempt('lookup', `retrieving ${entity} ${ref}`, () => this.store.resolveEntityField(entity, ref, fieldName));
    if (!result.ok) {
      Logger.warn(`Error ${result.error.message}`);
      return '';
    }
    const name = result.value ?? '';
    this.names.set(ref, name);
    return name;
  }

  /**
   * Region names mapped to a pre-lead, lead or opportunity. Never empty: an
   * entity without regions, or whose mappings could not be fetched, yields [""].
   */
  async resolveGeographies(source: GeographySource, entityId: string): Promise<readonly string[]> {
    const cached = this.geographies.get(entityId);
    if (cached) return cached;

    const names: string[] = [];
    const mappings = await attempt('geography', `fetching geographies for ${source} ${entityId}`, () =>
      this.store.fetchGeographyMappings(source, entityId)
    );
    for (const regionId of valueOr(mappings, [])) {
      if (!regionId) continue;
      names.push(await this.resolveName(NAME_LOOKUP.REGION.entity, regionId, NAME_LOOKUP.REGION.field));
    }

    const resolved = names.length > 0 ? names : NO_GEOGRAPHY;
    this.geographies.set(entityId, resolved);
    return resolved;
  }
}

export default LookupCache;
