import { FatalConnectionError } from '../../errors';
import type { ExpandedRow, RawProductRecord, RecordStore, ReportWriter, UserFilter, UserRecord } from '../../types';

export const LOB = 100000000;
export const SEED_ROLE = 515140005;
export const MANAGER_ROLE = 515140004;

export function makeUser(id: string, managerId: string | null = null, role: number = SEED_ROLE): UserRecord {
  return { id, fullName: `User ${id}`, email: `${id}@example.test`, segment: 100000002, lob: LOB, role, managerId };
}

export function makeRaw(id: string, overrides: Partial<RawProductRecord> = {}): RawProductRecord {
  return {
    id,
    name: `Product ${id}`,
    ownerId: null,
    createdById: null,
    leadId: null,
    preLeadId: null,
    opportunityId: null,
    productId: null,
    projectId: null,
    contractorId: null,
    purchaseOrderId: null,
    salesOrderId: null,
    potential: 0,
    createdOn: new Date('2024-01-01T00:00:00Z'),
    statusCode: null,
    lobCode: LOB,
    ...overrides
  };
}

/**
 * In-memory RecordStore. Keys in `failures` make the matching call reject:
 *   users, shared:<userId>, products:<userId>, lookup:<id>, geo:<entityId>, option:<attribute>
 * Keys in `fatal` reject with FatalConnectionError instead, as a dropped session would.
 */
export class FakeRecordStore implements RecordStore {
  users: UserRecord[] = [];
  shared = new Map<string, string[]>();
  products = new Map<string, RawProductRecord>();
  /** `${source}:${entityId}` → region ids */
  geographies = new Map<string, string[]>();
  /** `${entity}:${id}` → field value */
  names = new Map<string, string | null>();
  /** `${attribute}:${code}` → label */
  labels = new Map<string, string>();
  failures = new Set<string>();
  fatal = new Set<string>();
  calls: string[] = [];

  private lastSharedUser = '';

  private check(key: string): void {
    if (this.fatal.has(key)) throw new FatalConnectionError(`connection lost at ${key}`);
    if (this.failures.has(key)) throw new Error(`injected failure at ${key}`);
  }

  count(prefix: string): number {
    return this.calls.filter((call) => call.startsWith(prefix)).length;
  }

  share(userId: string, ...products: RawProductRecord[]): void {
    const ids = this.shared.get(userId) ?? [];
    for (const product of products) {
      this.products.set(product.id, product);
      ids.push(product.id);
    }
    this.shared.set(userId, ids);
  }

  async fetchUsers(_filter: UserFilter): Promise<UserRecord[]> {
    this.calls.push('users');
    this.check('users');
    return this.users;
  }

  async fetchSharedProductIds(userId: string): Promise<string[]> {
    this.calls.push(`shared:${userId}`);
    this.check(`shared:${userId}`);
    this.lastSharedUser = userId;
    return [...(this.shared.get(userId) ?? [])];
  }

  async fetchProducts(ids: string[], lob: number): Promise<RawProductRecord[]> {
    this.calls.push(`products:${this.lastSharedUser}`);
    this.check(`products:${this.lastSharedUser}`);
    const found: RawProductRecord[] = [];
    for (const id of ids) {
      const product = this.products.get(id);
      if (product && product.lobCode === lob) found.push(product);
    }
    return found;
  }

  async fetchGeographyMappings(source: string, entityId: string): Promise<string[]> {
    this.calls.push(`geo:${entityId}`);
    this.check(`geo:${entityId}`);
    return this.geographies.get(`${source}:${entityId}`) ?? [];
  }

  async resolveEntityField(entity: string, id: string, _fieldName: string): Promise<string | null> {
    this.calls.push(`lookup:${id}`);
    this.check(`lookup:${id}`);
    return this.names.get(`${entity}:${id}`) ?? null;
  }

  async resolveOptionLabel(_entity: string, attributeName: string, code: number): Promise<string> {
    this.calls.push(`option:${attributeName}`);
    this.check(`option:${attributeName}`);
    return this.labels.get(`${attributeName}:${code}`) ?? '';
  }
}

export interface EmittedReport {
  reportName: string;
  destinationId: string;
  rowIds: string[];
}

/** ReportWriter that records what it was asked to emit */
export class RecordingWriter implements ReportWriter {
  reports: EmittedReport[] = [];
  failFor = new Set<string>();

  async emit(rows: readonly ExpandedRow[], reportName: string, destinationId: string): Promise<boolean> {
    this.reports.push({ reportName, destinationId, rowIds: rows.map((row) => row.id) });
    return !this.failFor.has(destinationId);
  }

  reportFor(destinationId: string): EmittedReport | undefined {
    return this.reports.find((report) => report.destinationId === destinationId);
  }
}
