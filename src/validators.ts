// Runtime validators for external data: Web API rows, connection settings, config.
// Row validation is warn-and-skip: one malformed row never blocks a report.

import { z } from 'zod';
import Logger from './logger';

interface ValidationResult {
  valid: boolean;
  issues: string[];
}

function fromZodResult(result: {
  success: boolean;
  error?: { issues: Array<{ path: PropertyKey[]; message: string }> };
}): ValidationResult {
  if (result.success) return { valid: true, issues: [] };
  const issues = (result.error?.issues ?? []).map((i) => `${i.path.map(String).join('.')}: ${i.message}`);
  return { valid: false, issues };
}

// ============================================================================
// Dataverse Web API rows
// ============================================================================

const guid = z.string().regex(/^[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}$/, 'expected a GUID');
const optionalGuid = guid.nullable().optional();
const optionalNumber = z.number().nullable().optional();

const odataCollectionSchema = z
  .object({
    value: z.array(z.unknown()),
    '@odata.nextLink': z.string().url().optional()
  })
  .passthrough();

export const systemUserSchema = z
  .object({
    systemuserid: guid,
    fullname: z.string().nullable().optional(),
    internalemailaddress: z.string().nullable().optional(),
    zox_segment: optionalNumber,
    zox_lob: optionalNumber,
    zox_role: optionalNumber,
    _parentsystemuserid_value: optionalGuid
  })
  .passthrough();

export const opportunityProductSchema = z
  .object({
    zox_opportunityproductid: guid,
    zox_name: z.string().nullable().optional(),
    zox_potential_: optionalNumber,
    createdon: z.string().datetime({ offset: true }),
    zox_productstatus: optionalNumber,
    zox_lob: optionalNumber
  })
  .passthrough();

export const optionSetSchema = z
  .object({
    Options: z.array(
      z
        .object({
          Value: z.number()
        })
        .passthrough()
    )
  })
  .passthrough();

/** Validate an OData collection envelope ({ value: [...] }) */
export function validateCollection(data: unknown): ValidationResult {
  return fromZodResult(odataCollectionSchema.safeParse(data));
}

/** Keep rows the schema accepts; log and drop the rest */
export function keepValidRows<T>(rows: T[], schema: z.ZodTypeAny, label: string): T[] {
  return rows.filter((row, i) => {
    const result = fromZodResult(schema.safeParse(row));
    if (!result.valid) Logger.warn(`${label} row ${i} skipped:`, result.issues);
    return result.valid;
  });
}

// ============================================================================
// Connection settings
// ============================================================================

export const connectionSettingsSchema = z
  .object({
    url: z.string().url(),
    tenantId: z.string().min(1),
    clientId: z.string().min(1),
    clientSecret: z.string().min(1)
  })
  .strict();

// ============================================================================
// Reporter config
// ============================================================================

const optionCode = z.number().int();

/** One schema per top-level config key so a bad key can be healed on its own */
export const reporterConfigShape = {
  userFilter: z
    .object({
      segment: optionCode,
      lob: optionCode,
      roles: z.array(optionCode).min(1)
    })
    .strict(),
  seedRole: optionCode,
  delivery: z.enum(['dataverse', 'directory']),
  outputDir: z.string().min(1),
  fileAttribute: z.string().regex(/^[a-z_][a-z0-9_]*$/, 'expected a logical attribute name'),
  productBatchSize: z.number().int().min(1).max(200)
};
