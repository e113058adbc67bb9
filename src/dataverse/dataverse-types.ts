// Dataverse Web API response shapes
// Lookup columns arrive as `_<attribute>_value` GUID strings; option sets as integers.

export interface ODataCollection<T> {
  value: T[];
  '@odata.nextLink'?: string;
}

export interface DVWhoAmIResponse {
  UserId: string;
  BusinessUnitId: string;
  OrganizationId: string;
}

export interface DVTokenResponse {
  access_token: string;
  expires_in: number;
  token_type: string;
}

export interface DVSystemUser {
  systemuserid: string;
  fullname?: string | null;
  internalemailaddress?: string | null;
  zox_segment?: number | null;
  zox_lob?: number | null;
  zox_role?: number | null;
  _parentsystemuserid_value?: string | null;
}

export interface DVPrincipalObjectAccess {
  _objectid_value?: string | null;
  objectid?: string | null;
}

export interface DVOpportunityProduct {
  zox_opportunityproductid: string;
  zox_name?: string | null;
  _ownerid_value?: string | null;
  _createdby_value?: string | null;
  _zox_lead_value?: string | null;
  _zox_prelead_value?: string | null;
  _zox_opportunity_value?: string | null;
  _zox_product_value?: string | null;
  _zox_project__value?: string | null;
  _zox_contractor__value?: string | null;
  _zox_ponumber_value?: string | null;
  _zox_sonumber_value?: string | null;
  zox_potential_?: number | null;
  createdon: string;
  zox_productstatus?: number | null;
  zox_lob?: number | null;
}

export interface DVGeographyMapping {
  _zox_region_value?: string | null;
}

export interface DVLocalizedLabel {
  Label: string;
}

export interface DVOptionMetadata {
  Value: number;
  Label?: { UserLocalizedLabel?: DVLocalizedLabel | null } | null;
}

export interface DVOptionSetMetadata {
  Options: DVOptionMetadata[];
}

/** PicklistAttributeMetadata with $expand=OptionSet */
export interface DVPicklistAttributeMetadata {
  OptionSet?: DVOptionSetMetadata | null;
}
