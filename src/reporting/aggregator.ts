// Aggregator — shared product rows for a user, optionally with their direct reports

import { attempt, unwrap } from '../errors';
import Logger from '../logger';
import type { ExpandedRow, RecordStore, UserRecord } from '../types';
import type HierarchyIndex from './hierarchy-index';
import type LookupCache from './lookup-cache';
import { expandRecord, resolveGeographySet, resolveProduct } from './record-expander';
import { dedupRows } from './utils';

class ProductAggregator {
  private store: RecordStore;
  private cache: LookupCache;
  private index: HierarchyIndex;

  constructor(store: RecordStore, cache: LookupCache, index: HierarchyIndex) {
    this.store = store;
    this.cache = cache;
    this.index = index;
  }

  /**
   * Rows for the products shared with a user, restricted to the user's line of business.
   * Failed access or product queries are raised; the caller abandons the node.
   */
  async productsFor(userId: string, lob: number): Promise<ExpandedRow[]> {
    const sharedIds = unwrap(
      await attempt('shared-access', `fetching shared products for user ${userId}`, () => this.store.fetchSharedProductIds(userId))
    );
    if (sharedIds.length === 0) return [];

    const products = unwrap(
      await attempt('products', `fetching ${sharedIds.length} products for user ${userId}`, () => this.store.fetchProducts(sharedIds, lob))
    );

    const rows: ExpandedRow[] = [];
    for (const raw of products) {
      const geographies = await resolveGeographySet(raw, this.cache);
      const product = await resolveProduct(raw, this.cache, this.store);
      rows.push(...expandRecord(product, geographies));
    }

    Logger.debug(`User ${userId}: ${sharedIds.length} shared, ${products.length} in LOB ${lob}, ${rows.length} rows`);
    return dedupRows(rows);
  }

  /** The user's own rows plus those of every direct report not yet processed in this run */
  async productsForUserAndSubordinates(user: UserRecord, processed: ReadonlySet<string>): Promise<ExpandedRow[]> {
    const rows = await this.productsFor(user.id, user.lob);

    for (const subordinate of this.index.subordinatesOf(user.id)) {
      if (processed.has(subordinate.id)) continue;
      rows.push(...(await this.productsFor(subordinate.id, subordinate.lob)));
    }

    return dedupRows(rows);
  }
}

export default ProductAggregator;
