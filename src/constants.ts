// Application-wide Constants
// Dataverse schema names, option codes and report layout

// ============================================================================
// USER DIRECTORY
// ============================================================================

/** Option codes on systemuser used to select the reporting population */
export const USER_SEGMENT = {
  INSTITUTIONAL: 100000002
} as const;

export const USER_LOB = {
  DEFAULT: 100000000
} as const;

export const USER_ROLE = {
  REGIONAL_MANAGER: 515140004,
  HPR: 515140005, // traversal seed
  ZONAL_HEAD: 100000006
} as const;

/** Numeric stand-in for an option set value missing on the record */
export const MISSING_OPTION = -1;

/** Display name used when a user record has no fullname */
export const MISSING_USER_NAME = 'N/A';

// ============================================================================
// ENTITIES
// ============================================================================

export const ENTITY = {
  SYSTEM_USER: 'systemuser',
  OPPORTUNITY_PRODUCT: 'zox_opportunityproduct',
  PRINCIPAL_OBJECT_ACCESS: 'principalobjectaccess',
  GEOGRAPHY_MAPPING: 'zox_leadgeographymapping',
  REGION_MASTER: 'zox_regionmaster',
  LEAD: 'lead',
  PRE_LEAD: 'zox_prelead',
  OPPORTUNITY: 'opportunity',
  PRODUCT_CODE: 'zox_productcode',
  PROJECT: 'zox_project',
  ACCOUNT: 'account',
  PURCHASE_ORDER: 'zox_purchaseorder',
  SALES_ORDER: 'salesorder'
} as const;

export type EntityName = (typeof ENTITY)[keyof typeof ENTITY];

/** Web API entity set (collection) name for each logical name */
export const ENTITY_SET: Record<EntityName, string> = {
  systemuser: 'systemusers',
  zox_opportunityproduct: 'zox_opportunityproducts',
  principalobjectaccess: 'principalobjectaccessset',
  zox_leadgeographymapping: 'zox_leadgeographymappings',
  zox_regionmaster: 'zox_regionmasters',
  lead: 'leads',
  zox_prelead: 'zox_preleads',
  opportunity: 'opportunities',
  zox_productcode: 'zox_productcodes',
  zox_project: 'zox_projects',
  account: 'accounts',
  zox_purchaseorder: 'zox_purchaseorders',
  salesorder: 'salesorders'
};

/**
 * Lookup columns on the geography mapping table. A mapping row points at
 * exactly one of these.
 */
export const GEOGRAPHY_SOURCE = {
  PRE_LEAD: 'zox_prelead',
  LEAD: 'zox_lead',
  OPPORTUNITY: 'zox_opportunity'
} as const;

export type GeographySource = (typeof GEOGRAPHY_SOURCE)[keyof typeof GEOGRAPHY_SOURCE];

/** Entity + attribute that supplies the display name for each related record */
export interface NameLookup {
  entity: EntityName;
  field: string;
}

export const NAME_LOOKUP = {
  LEAD: { entity: ENTITY.LEAD, field: 'fullname' },
  PRE_LEAD: { entity: ENTITY.PRE_LEAD, field: 'zox_name' },
  OPPORTUNITY: { entity: ENTITY.OPPORTUNITY, field: 'name' },
  PRODUCT: { entity: ENTITY.PRODUCT_CODE, field: 'zox_name' },
  PROJECT: { entity: ENTITY.PROJECT, field: 'zox_name' },
  CONTRACTOR: { entity: ENTITY.ACCOUNT, field: 'name' },
  PURCHASE_ORDER: { entity: ENTITY.PURCHASE_ORDER, field: 'zox_name' },
  SALES_ORDER: { entity: ENTITY.SALES_ORDER, field: 'name' },
  CREATOR: { entity: ENTITY.SYSTEM_USER, field: 'fullname' },
  REGION: { entity: ENTITY.REGION_MASTER, field: 'zox_name' }
} as const satisfies Record<string, NameLookup>;

// ============================================================================
// OPTION SETS
// ============================================================================

export const OPTION_ATTRIBUTE = {
  PRODUCT_STATUS: 'zox_productstatus',
  LOB: 'zox_lob'
} as const;

/** Attributes bound to a global option set; everything else is a local picklist */
export const GLOBAL_OPTION_SETS: ReadonlySet<string> = new Set([OPTION_ATTRIBUTE.LOB]);

/** Label shown when a record carries no option value */
export const DEFAULT_OPTION_LABEL = 'Open';

// ============================================================================
// DATAVERSE WEB API
// ============================================================================

export const WEB_API_PATH = '/api/data/v9.2/';

export const HTTP_STATUS = {
  OK: 200,
  NO_CONTENT: 204,
  UNAUTHORIZED: 401,
  FORBIDDEN: 403,
  TOO_MANY_REQUESTS: 429
} as const;

/** Product ids per `$filter` clause when fetching shared products */
export const DEFAULT_PRODUCT_BATCH_SIZE = 50;

/** Fallback block size for chunked file uploads when the server does not advertise one */
export const UPLOAD_CHUNK_SIZE = 4 * 1024 * 1024;

export const DEFAULT_FILE_ATTRIBUTE = 'zx_file';

// ============================================================================
// REPORT LAYOUT
// ============================================================================

export const WORKSHEET_NAME = 'Opportunity Products';

export const REPORT_HEADERS = [
  'S.No.',
  'Pre Lead',
  'Lead',
  'Lob',
  'Opportunity',
  'Project',
  'Created By',
  'Created On',
  'Product',
  'Potential',
  'Contractor',
  'PO Number',
  'SO Number',
  'Lead Geography',
  'OP Aging',
  'Status'
] as const;

export const HEADER_FILL_ARGB = 'FFD3D3D3'; // light gray

/** Characters replaced with "_" when a report name becomes a file name */
export const INVALID_FILE_NAME_CHARS = /["<>|:*?\\/\u0000-\u001f]/;

export const MS_PER_DAY = 24 * 60 * 60 * 1000;
