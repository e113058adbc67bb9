import { DEFAULT_PRODUCT_BATCH_SIZE, ENTITY, ENTITY_SET, type EntityName, GLOBAL_OPTION_SETS, type GeographySource, MISSING_OPTION, MISSING_USER_NAME } from '../constants';
import Logger from '../logger';
import type { RawProductRecord, RecordStore, UserFilter, UserRecord } from '../types';
import { keepValidRows, opportunityProductSchema, optionSetSchema, systemUserSchema } from '../validators';
import type { DataverseSession } from './dataverse-session';
import type {
  DVGeographyMapping,
  DVOpportunityProduct,
  DVOptionSetMetadata,
  DVPicklistAttributeMetadata,
  DVPrincipalObjectAccess,
  DVSystemUser
} from './dataverse-types';

/** The part of a session the store reads through */
export type WebApiReader = Pick<DataverseSession, 'apiGet' | 'apiGetAll'>;

const USER_COLUMNS = ['systemuserid', 'fullname', 'zox_segment', 'zox_lob', 'zox_role', 'internalemailaddress', '_parentsystemuserid_value'];

const PRODUCT_COLUMNS = [
  'zox_opportunityproductid',
  'zox_name',
  '_ownerid_value',
  '_createdby_value',
  '_zox_lead_value',
  '_zox_prelead_value',
  'zox_lob',
  '_zox_opportunity_value',
  '_zox_product_value',
  'zox_productstatus',
  'createdon',
  '_zox_project__value',
  '_zox_contractor__value',
  '_zox_ponumber_value',
  '_zox_sonumber_value',
  'zox_potential_'
];

/** Normalize a GUID (or null) to lower case so ids compare equal across responses */
const normalizeId = (id: string | null | undefined): string | null => (id ? id.toLowerCase() : null);

/** OData string literal with embedded quotes doubled */
const odataString = (value: string): string => `'${value.replace(/'/g, "''")}'`;

function isEntityName(name: string): name is EntityName {
  return name in ENTITY_SET;
}

function entitySetOf(entity: string): string {
  if (!isEntityName(entity)) throw new Error(`No entity set known for ${entity}`);
  return ENTITY_SET[entity];
}

/** Build a relative Web API query URL */
export function buildQuery(entitySet: string, select: string[], filter?: string): string {
  const params = [`$select=${select.join(',')}`];
  if (filter) params.push(`$filter=${encodeURIComponent(filter)}`);
  return `${entitySet}?${params.join('&')}`;
}

export function toUserRecord(row: DVSystemUser): UserRecord {
  return {
    id: row.systemuserid.toLowerCase(),
    fullName: row.fullname ?? MISSING_USER_NAME,
    email: row.internalemailaddress ?? '',
    segment: row.zox_segment ?? MISSING_OPTION,
    lob: row.zox_lob ?? MISSING_OPTION,
    role: row.zox_role ?? MISSING_OPTION,
    managerId: normalizeId(row._parentsystemuserid_value)
  };
}

export function toRawProduct(row: DVOpportunityProduct): RawProductRecord {
  return {
    id: row.zox_opportunityproductid.toLowerCase(),
    name: row.zox_name ?? '',
    ownerId: normalizeId(row._ownerid_value),
    createdById: normalizeId(row._createdby_value),
    leadId: normalizeId(row._zox_lead_value),
    preLeadId: normalizeId(row._zox_prelead_value),
    opportunityId: normalizeId(row._zox_opportunity_value),
    productId: normalizeId(row._zox_product_value),
    projectId: normalizeId(row._zox_project__value),
    contractorId: normalizeId(row._zox_contractor__value),
    purchaseOrderId: normalizeId(row._zox_ponumber_value),
    salesOrderId: normalizeId(row._zox_sonumber_value),
    potential: row.zox_potential_ ?? 0,
    createdOn: new Date(row.createdon),
    statusCode: row.zox_productstatus ?? null,
    lobCode: row.zox_lob ?? null
  };
}

/**
 * RecordStore over the Dataverse Web API.
 *
 * Option set metadata is static for the lifetime of a run, so it is fetched once
 * per attribute and kept on the instance.
 */
class DataverseRecordStore implements RecordStore {
  private api: WebApiReader;
  private batchSize: number;
  private optionSets = new Map<string, DVOptionSetMetadata>();

  constructor(api: WebApiReader, options: { productBatchSize?: number } = {}) {
    this.api = api;
    this.batchSize = options.productBatchSize ?? DEFAULT_PRODUCT_BATCH_SIZE;
  }

  async fetchUsers(filter: UserFilter): Promise<UserRecord[]> {
    const roles = filter.roles.map((role) => `zox_role eq ${role}`).join(' or ');
    const query = buildQuery(ENTITY_SET.systemuser, USER_COLUMNS, `zox_segment eq ${filter.segment} and zox_lob eq ${filter.lob} and (${roles})`);
    const rows = await this.api.apiGetAll<DVSystemUser>(query, 'Users');
    const users = keepValidRows(rows, systemUserSchema, 'systemuser').map(toUserRecord);
    Logger.info(`Found ${users.length} filtered users`);
    return users;
  }

  async fetchSharedProductIds(userId: string): Promise<string[]> {
    const filter = `_principalid_value eq ${userId} and objecttypecode eq ${odataString(ENTITY.OPPORTUNITY_PRODUCT)} and accessrightsmask gt 0`;
    const query = buildQuery(ENTITY_SET.principalobjectaccess, ['_objectid_value'], filter);
    const rows = await this.api.apiGetAll<DVPrincipalObjectAccess>(query, 'Shared products');

    const ids: string[] = [];
    for (const row of rows) {
      const id = normalizeId(row._objectid_value ?? row.objectid);
      if (id) ids.push(id);
    }
    return ids;
  }

  /** Products among `ids` in the given LOB. The id filter is split into batches to bound URL length. */
  async fetchProducts(ids: string[], lob: number): Promise<RawProductRecord[]> {
    const products: RawProductRecord[] = [];

    for (let i = 0; i < ids.length; i += this.batchSize) {
      const batch = ids.slice(i, i + this.batchSize);
      const idFilter = batch.map((id) => `zox_opportunityproductid eq ${id}`).join(' or ');
      const query = buildQuery(ENTITY_SET.zox_opportunityproduct, PRODUCT_COLUMNS, `(${idFilter}) and zox_lob eq ${lob}`);
      const rows = await this.api.apiGetAll<DVOpportunityProduct>(query, 'Opportunity products');
      products.push(...keepValidRows(rows, opportunityProductSchema, ENTITY.OPPORTUNITY_PRODUCT).map(toRawProduct));
    }

    return products;
  }

  async fetchGeographyMappings(source: GeographySource, entityId: string): Promise<string[]> {
    const query = buildQuery(ENTITY_SET.zox_leadgeographymapping, ['_zox_region_value'], `_${source}_value eq ${entityId}`);
    const rows = await this.api.apiGetAll<DVGeographyMapping>(query, 'Geography mappings');

    const regions: string[] = [];
    for (const row of rows) {
      const regionId = normalizeId(row._zox_region_value);
      if (regionId) regions.push(regionId);
    }
    return regions;
  }

  async resolveEntityField(entity: string, id: string, fieldName: string): Promise<string | null> {
    const row = await this.api.apiGet<Record<string, unknown>>(`${entitySetOf(entity)}(${id})?$select=${fieldName}`, `${entity} ${id}`);
    const value = row[fieldName];
    if (value === null || value === undefined) return null;
    return String(value);
  }

  async resolveOptionLabel(entity: string, attributeName: string, code: number): Promise<string> {
    const optionSet = await this.optionSetFor(entity, attributeName);
    const option = optionSet.Options.find((o) => o.Value === code);
    return option?.Label?.UserLocalizedLabel?.Label ?? '';
  }

  private async optionSetFor(entity: string, attributeName: string): Promise<DVOptionSetMetadata> {
    const key = `${entity}.${attributeName}`;
    const cached = this.optionSets.get(key);
    if (cached) return cached;

    const optionSet = await this.fetchOptionSet(entity, attributeName);
    this.optionSets.set(key, optionSet);
    return optionSet;
  }

  /** Global option sets are read by name; local picklists through the attribute's metadata */
  private async fetchOptionSet(entity: string, attributeName: string): Promise<DVOptionSetMetadata> {
    let optionSet: DVOptionSetMetadata | null | undefined;
    if (GLOBAL_OPTION_SETS.has(attributeName)) {
      optionSet = await this.api.apiGet<DVOptionSetMetadata>(
        `GlobalOptionSetDefinitions(Name=${odataString(attributeName)})`,
        `Option set ${attributeName}`
      );
    } else {
      const metadata = await this.api.apiGet<DVPicklistAttributeMetadata>(
        `EntityDefinitions(LogicalName=${odataString(entity)})/Attributes(LogicalName=${odataString(attributeName)})` +
          '/Microsoft.Dynamics.CRM.PicklistAttributeMetadata?$select=LogicalName&$expand=OptionSet',
        `Attribute ${entity}.${attributeName}`
      );
      optionSet = metadata.OptionSet;
    }

    if (!optionSet || !optionSetSchema.safeParse(optionSet).success) {
      throw new Error(`Option set metadata for ${attributeName} is missing or malformed`);
    }
    return optionSet;
  }
}

export default DataverseRecordStore;
