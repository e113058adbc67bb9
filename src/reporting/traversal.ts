// Traversal Orchestrator — seed users → subordinates → management chain
//
// Every user is handled at most once per run. The processed set is the only
// thing that stops a climb through a cyclic manager chain.

import { RecoverableUserError, recoveryFor } from '../errors';
import Logger from '../logger';
import type { ExpandedRow, RecordStore, ReportWriter, TraversalSummary, UserRecord } from '../types';
import ProductAggregator from './aggregator';
import type HierarchyIndex from './hierarchy-index';
import LookupCache from './lookup-cache';
import { teamReportName, unionRows } from './utils';

class TraversalOrchestrator {
  private index: HierarchyIndex;
  private writer: ReportWriter;
  private cache: LookupCache;
  private aggregator: ProductAggregator;
  private processed = new Set<string>();
  private summary: TraversalSummary = { seeds: 0, processedUsers: 0, reportsEmitted: 0, reportsFailed: 0, failedSeeds: [] };

  constructor(store: RecordStore, index: HierarchyIndex, writer: ReportWriter) {
    this.index = index;
    this.writer = writer;
    this.cache = new LookupCache(store);
    this.aggregator = new ProductAggregator(store, this.cache, index);
  }

  /** Users handled so far, in the order they were claimed */
  get processedUsers(): ReadonlySet<string> {
    return this.processed;
  }

  /** Process every seed user in list order. Only an abort-run failure rejects. */
  async run(seedRole: number): Promise<TraversalSummary> {
    const seeds = this.index.usersWithRole(seedRole);
    Logger.info(`Processing ${seeds.length} seed users`);
    this.summary.seeds = seeds.length;

    for (const seed of seeds) {
      await this.processSeed(seed);
    }

    this.summary.processedUsers = this.processed.size;
    return { ...this.summary, failedSeeds: [...this.summary.failedSeeds] };
  }

  /** Mark a user processed. Returns false when it already was. */
  private claim(userId: string): boolean {
    if (this.processed.has(userId)) return false;
    this.processed.add(userId);
    return true;
  }

  private async processSeed(seed: UserRecord): Promise<void> {
    if (!this.claim(seed.id)) return;

    try {
      this.cache.reset();

      const rows = await this.aggregator.productsForUserAndSubordinates(seed, this.processed);
      if (rows.length === 0) {
        Logger.debug(`No shared products for ${seed.fullName}, skipping`);
        return;
      }

      await this.emit(rows, seed);
      await this.climb(seed, rows);
    } catch (error) {
      if (recoveryFor(error) === 'abort-run') throw error;
      const failure = new RecoverableUserError(seed.id, seed.fullName, { cause: error });
      Logger.error(failure.message);
      this.summary.failedSeeds.push(seed.id);
    }
  }

  /** Walk up the management chain, emitting each manager's cumulative report */
  private async climb(start: UserRecord, startRows: ExpandedRow[]): Promise<void> {
    let accumulated = startRows;
    let managerId = start.managerId;

    while (managerId && !this.processed.has(managerId)) {
      const manager = this.index.recordOf(managerId);
      if (!manager) {
        Logger.warn(`Manager ${managerId} of ${start.fullName}'s chain is not in the user list, stopping climb`);
        break;
      }
      this.claim(manager.id);

      const managerRows = await this.aggregator.productsForUserAndSubordinates(manager, this.processed);
      accumulated = unionRows(accumulated, managerRows);
      await this.emit(accumulated, manager);

      managerId = manager.managerId;
    }
  }

  private async emit(rows: readonly ExpandedRow[], owner: UserRecord): Promise<void> {
    const delivered = await this.writer.emit(rows, teamReportName(owner.fullName), owner.id);
    if (delivered) this.summary.reportsEmitted++;
    else this.summary.reportsFailed++;
  }
}

export default TraversalOrchestrator;
