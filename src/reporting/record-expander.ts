// Record Expander — raw product + geography set → report rows

import { DEFAULT_OPTION_LABEL, ENTITY, GEOGRAPHY_SOURCE, NAME_LOOKUP, OPTION_ATTRIBUTE } from '../constants';
import { attempt, valueOr } from '../errors';
import type { ExpandedRow, RawProductRecord, RecordStore, ResolvedProduct } from '../types';
import type LookupCache from './lookup-cache';
import { formatAmount, rowId } from './utils';

/**
 * Union of the regions mapped to the record's pre-lead, lead and opportunity,
 * first-seen order, distinct by name. [""] when nothing resolves.
 */
export async function resolveGeographySet(raw: RawProductRecord, cache: LookupCache): Promise<string[]> {
  const geographies = new Set<string>();
  const sources = [
    [GEOGRAPHY_SOURCE.PRE_LEAD, raw.preLeadId],
    [GEOGRAPHY_SOURCE.LEAD, raw.leadId],
    [GEOGRAPHY_SOURCE.OPPORTUNITY, raw.opportunityId]
  ] as const;

  for (const [source, entityId] of sources) {
    if (!entityId) continue;
    for (const name of await cache.resolveGeographies(source, entityId)) {
      geographies.add(name);
    }
  }

  return geographies.size > 0 ? [...geographies] : [''];
}

/** Option label for a product attribute. "Open" for no value, "" when the label cannot be read. */
async function resolveProductOption(store: RecordStore, attributeName: string, code: number | null): Promise<string> {
  if (code === null) return DEFAULT_OPTION_LABEL;
  const result = await attempt('option-label', `retrieving option set ${attributeName}`, () =>
    store.resolveOptionLabel(ENTITY.OPPORTUNITY_PRODUCT, attributeName, code)
  );
  return valueOr(result, '');
}

/** Resolve every related record and option value of a raw product to display text */
export async function resolveProduct(raw: RawProductRecord, cache: LookupCache, store: RecordStore): Promise<ResolvedProduct> {
  const name = (lookup: { entity: string; field: string }, ref: string | null) => cache.resolveName(lookup.entity, ref, lookup.field);

  return {
    recordId: raw.id,
    productName: raw.name,
    ownerId: raw.ownerId,
    preLead: await name(NAME_LOOKUP.PRE_LEAD, raw.preLeadId),
    lead: await name(NAME_LOOKUP.LEAD, raw.leadId),
    lob: await resolveProductOption(store, OPTION_ATTRIBUTE.LOB, raw.lobCode),
    opportunity: await name(NAME_LOOKUP.OPPORTUNITY, raw.opportunityId),
    project: await name(NAME_LOOKUP.PROJECT, raw.projectId),
    createdBy: await name(NAME_LOOKUP.CREATOR, raw.createdById),
    createdOn: raw.createdOn,
    product: await name(NAME_LOOKUP.PRODUCT, raw.productId),
    potential: formatAmount(raw.potential),
    contractor: await name(NAME_LOOKUP.CONTRACTOR, raw.contractorId),
    poNumber: await name(NAME_LOOKUP.PURCHASE_ORDER, raw.purchaseOrderId),
    soNumber: await name(NAME_LOOKUP.SALES_ORDER, raw.salesOrderId),
    status: await resolveProductOption(store, OPTION_ATTRIBUTE.PRODUCT_STATUS, raw.statusCode)
  };
}

/**
 * One row per geography.
 *
 * An empty geography only produces a row when it is the sole entry; as soon as a
 * named region is present, empty entries are dropped. Repeated names collapse.
 */
export function expandRecord(product: ResolvedProduct, geographies: readonly string[]): ExpandedRow[] {
  const distinct = [...new Set(geographies.length > 0 ? geographies : [''])];
  const kept = distinct.length === 1 ? distinct : distinct.filter((geography) => geography !== '');
  return kept.map((geography) => ({ ...product, id: rowId(product.recordId, geography), geography }));
}
