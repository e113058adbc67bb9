import { beforeEach, describe, expect, it } from 'vitest';
import Logger from '../../logger';
import DataverseRecordStore, { type WebApiReader, buildQuery, toRawProduct } from '../dataverse-record-store';

Logger.disableConsole();

const G1 = 'AAAAAAAA-0000-0000-0000-000000000001';
const G2 = 'aaaaaaaa-0000-0000-0000-000000000002';
const G3 = 'aaaaaaaa-0000-0000-0000-000000000003';
const MANAGER = 'BBBBBBBB-0000-0000-0000-000000000001';

/** Web API stand-in: answers each URL with a JSON body picked by the test */
class FakeWebApi implements WebApiReader {
  urls: string[] = [];
  private routes: Array<{ match: (url: string) => boolean; body: string }> = [];

  on(match: (url: string) => boolean, body: unknown): this {
    this.routes.push({ match, body: JSON.stringify(body) });
    return this;
  }

  private respond(url: string): string {
    this.urls.push(decodeURIComponent(url));
    const route = this.routes.find((r) => r.match(decodeURIComponent(url)));
    if (!route) throw new Error(`no route for ${url}`);
    return route.body;
  }

  async apiGet<T>(url: string, _label: string): Promise<T> {
    return JSON.parse(this.respond(url));
  }

  async apiGetAll<T>(url: string, _label: string): Promise<T[]> {
    return JSON.parse(this.respond(url));
  }
}

describe('buildQuery', () => {
  it('encodes the filter and leaves the select list readable', () => {
    expect(buildQuery('leads', ['fullname', 'leadid'], "name eq 'a b'")).toBe("leads?$select=fullname,leadid&$filter=name%20eq%20'a%20b'");
    expect(buildQuery('leads', ['fullname'])).toBe('leads?$select=fullname');
  });
});

describe('toRawProduct', () => {
  it('lower-cases ids and fills defaults for empty columns', () => {
    const raw = toRawProduct({ zox_opportunityproductid: G1, createdon: '2024-02-03T04:05:06Z', _zox_lead_value: MANAGER, zox_potential_: null });
    expect(raw.id).toBe(G1.toLowerCase());
    expect(raw.leadId).toBe(MANAGER.toLowerCase());
    expect(raw.preLeadId).toBeNull();
    expect(raw.potential).toBe(0);
    expect(raw.statusCode).toBeNull();
    expect(raw.createdOn.toISOString()).toBe('2024-02-03T04:05:06.000Z');
  });
});

describe('DataverseRecordStore', () => {
  let api: FakeWebApi;
  let store: DataverseRecordStore;

  beforeEach(() => {
    api = new FakeWebApi();
    store = new DataverseRecordStore(api, { productBatchSize: 2 });
  });

  it('fetches the filtered user directory and drops malformed rows', async () => {
    api.on(
      (url) => url.startsWith('systemusers?'),
      [
        { systemuserid: G1, fullname: 'Jane Doe', zox_role: 515140005, zox_segment: 100000002, zox_lob: 100000000, _parentsystemuserid_value: MANAGER },
        { systemuserid: G2 },
        { systemuserid: 'broken' }
      ]
    );

    const users = await store.fetchUsers({ segment: 100000002, lob: 100000000, roles: [515140004, 515140005] });

    expect(api.urls[0]).toBe(
      'systemusers?$select=systemuserid,fullname,zox_segment,zox_lob,zox_role,internalemailaddress,_parentsystemuserid_value' +
        '&$filter=zox_segment eq 100000002 and zox_lob eq 100000000 and (zox_role eq 515140004 or zox_role eq 515140005)'
    );
    expect(users).toEqual([
      { id: G1.toLowerCase(), fullName: 'Jane Doe', email: '', segment: 100000002, lob: 100000000, role: 515140005, managerId: MANAGER.toLowerCase() },
      { id: G2, fullName: 'N/A', email: '', segment: -1, lob: -1, role: -1, managerId: null }
    ]);
  });

  it('reads shared product ids from principal object access', async () => {
    api.on((url) => url.startsWith('principalobjectaccessset?'), [{ _objectid_value: G1 }, { _objectid_value: null }, { objectid: G2 }]);

    expect(await store.fetchSharedProductIds('u1')).toEqual([G1.toLowerCase(), G2]);
    expect(api.urls[0]).toContain("$filter=_principalid_value eq u1 and objecttypecode eq 'zox_opportunityproduct' and accessrightsmask gt 0");
  });

  it('fetches products in batches filtered by line of business', async () => {
    api.on((url) => url.includes(`eq ${G1} or`), [{ zox_opportunityproductid: G1, createdon: '2024-01-01T00:00:00Z', zox_lob: 100000000 }]);
    api.on((url) => url.includes(`(zox_opportunityproductid eq ${G3})`), [{ zox_opportunityproductid: G3, createdon: 'bad date' }]);

    const products = await store.fetchProducts([G1, G2, G3], 100000000);

    expect(api.urls).toHaveLength(2);
    expect(api.urls[0]).toContain(`$filter=(zox_opportunityproductid eq ${G1} or zox_opportunityproductid eq ${G2}) and zox_lob eq 100000000`);
    expect(products.map((p) => p.id)).toEqual([G1.toLowerCase()]);
    expect(products[0].lobCode).toBe(100000000);
  });

  it('queries geography mappings by the source lookup column', async () => {
    api.on((url) => url.startsWith('zox_leadgeographymappings?'), [{ _zox_region_value: G1 }, { _zox_region_value: null }]);

    expect(await store.fetchGeographyMappings('zox_prelead', 'p1')).toEqual([G1.toLowerCase()]);
    expect(api.urls[0]).toBe('zox_leadgeographymappings?$select=_zox_region_value&$filter=_zox_prelead_value eq p1');
  });

  it('resolves a single field of a related record', async () => {
    api.on((url) => url === 'leads(l1)?$select=fullname', { fullname: 'Lead One' });
    api.on((url) => url === 'zox_projects(p1)?$select=zox_name', { zox_name: null });

    expect(await store.resolveEntityField('lead', 'l1', 'fullname')).toBe('Lead One');
    expect(await store.resolveEntityField('zox_project', 'p1', 'zox_name')).toBeNull();
  });

  it('rejects an entity it has no entity set for', async () => {
    await expect(store.resolveEntityField('contact', 'c1', 'fullname')).rejects.toThrow('No entity set known for contact');
  });

  it('reads global option set labels once per attribute', async () => {
    api.on((url) => url === "GlobalOptionSetDefinitions(Name='zox_lob')", {
      Options: [
        { Value: 100000000, Label: { UserLocalizedLabel: { Label: 'Institutional' } } },
        { Value: 100000001, Label: null }
      ]
    });

    expect(await store.resolveOptionLabel('zox_opportunityproduct', 'zox_lob', 100000000)).toBe('Institutional');
    expect(await store.resolveOptionLabel('zox_opportunityproduct', 'zox_lob', 100000001)).toBe('');
    expect(await store.resolveOptionLabel('zox_opportunityproduct', 'zox_lob', 5)).toBe('');
    expect(api.urls).toHaveLength(1);
  });

  it('reads local picklist labels through attribute metadata', async () => {
    api.on((url) => url.startsWith("EntityDefinitions(LogicalName='zox_opportunityproduct')/Attributes(LogicalName='zox_productstatus')"), {
      OptionSet: { Options: [{ Value: 1, Label: { UserLocalizedLabel: { Label: 'Won' } } }] }
    });

    expect(await store.resolveOptionLabel('zox_opportunityproduct', 'zox_productstatus', 1)).toBe('Won');
    expect(api.urls[0]).toContain('/Microsoft.Dynamics.CRM.PicklistAttributeMetadata?$select=LogicalName&$expand=OptionSet');
  });

  it('rejects missing option set metadata and retries on the next call', async () => {
    api.on((url) => url.startsWith('EntityDefinitions'), { OptionSet: null });

    await expect(store.resolveOptionLabel('zox_opportunityproduct', 'zox_productstatus', 1)).rejects.toThrow(
      'Option set metadata for zox_productstatus is missing or malformed'
    );
    await expect(store.resolveOptionLabel('zox_opportunityproduct', 'zox_productstatus', 1)).rejects.toThrow();
    expect(api.urls).toHaveLength(2);
  });
});
