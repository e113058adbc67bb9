// Core Type Definitions for the team product reporter

import type { GeographySource } from './constants';

// ============================================================================
// USERS
// ============================================================================

/** A systemuser row as the reporter sees it. Ids are lower-case GUID strings. */
export interface UserRecord {
  id: string;
  fullName: string;
  email: string;
  segment: number;
  lob: number;
  role: number;
  /** Absent for the top of a management chain */
  managerId: string | null;
}

export interface UserFilter {
  segment: number;
  lob: number;
  roles: number[];
}

// ============================================================================
// PRODUCTS
// ============================================================================

/** Opportunity product as returned by the record store. Related records are referenced by id. */
export interface RawProductRecord {
  id: string;
  name: string;
  ownerId: string | null;
  createdById: string | null;
  leadId: string | null;
  preLeadId: string | null;
  opportunityId: string | null;
  productId: string | null;
  projectId: string | null;
  contractorId: string | null;
  purchaseOrderId: string | null;
  salesOrderId: string | null;
  /** Potential amount; 0 when the column is empty */
  potential: number;
  createdOn: Date;
  statusCode: number | null;
  lobCode: number | null;
}

/** A raw product with every related record and option value turned into display text */
export interface ResolvedProduct {
  recordId: string;
  productName: string;
  ownerId: string | null;
  preLead: string;
  lead: string;
  lob: string;
  opportunity: string;
  project: string;
  createdBy: string;
  createdOn: Date;
  product: string;
  potential: string;
  contractor: string;
  poNumber: string;
  soNumber: string;
  status: string;
}

/**
 * One report line. Identity is `id` = `${recordId}|${geography}`; two rows with the
 * same id are the same row for deduplication, whatever their other fields say.
 */
export interface ExpandedRow extends ResolvedProduct {
  id: string;
  geography: string;
}

// ============================================================================
// COLLABORATORS
// ============================================================================

/** Read access to the record store. Every method may reject; callers decide the recovery. */
export interface RecordStore {
  fetchUsers(filter: UserFilter): Promise<UserRecord[]>;
  fetchSharedProductIds(userId: string): Promise<string[]>;
  fetchProducts(ids: string[], lob: number): Promise<RawProductRecord[]>;
  /** Region ids mapped to the given pre-lead, lead or opportunity */
  fetchGeographyMappings(source: GeographySource, entityId: string): Promise<string[]>;
  resolveEntityField(entity: string, id: string, fieldName: string): Promise<string | null>;
  /** Label for an option value; empty string when the code is not defined */
  resolveOptionLabel(entity: string, attributeName: string, code: number): Promise<string>;
}

/** Final destination for a rendered report */
export interface ReportSink {
  readonly name: string;
  deliver(artifact: Buffer, fileName: string, destinationId: string): Promise<void>;
}

/** Anything that can turn a finished row set into a delivered report */
export interface ReportWriter {
  /** Resolves false when the report could not be produced or delivered */
  emit(rows: readonly ExpandedRow[], reportName: string, destinationId: string): Promise<boolean>;
}

// ============================================================================
// RUN
// ============================================================================

export type DeliveryMode = 'dataverse' | 'directory';

export interface ReporterConfig {
  userFilter: UserFilter;
  seedRole: number;
  delivery: DeliveryMode;
  /** Output directory for directory delivery, relative to the data directory */
  outputDir: string;
  fileAttribute: string;
  productBatchSize: number;
}

export interface ConnectionSettings {
  url: string;
  tenantId: string;
  clientId: string;
  clientSecret: string;
}

export interface TraversalSummary {
  seeds: number;
  processedUsers: number;
  reportsEmitted: number;
  reportsFailed: number;
  failedSeeds: string[];
}
