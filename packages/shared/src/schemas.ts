/**
 * JSON Schema Validation
 *
 * Ajv (draft 2020-12) validators for extraction results and persist_aum
 * payloads. Schemas live in docs/contracts and are compiled on first use.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { logger } from './logger';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});
addFormats(ajv);

export const SCHEMA_FILES = {
  aumResult: 'aum_extraction_result.schema.json',
  persistJob: 'persist_aum_job.schema.json',
} as const;

type SchemaKey = keyof typeof SCHEMA_FILES;

let schemasLoaded = false;

function schemaDirectories(): string[] {
  return [
    // Source tree (ts-jest, ts-node)
    path.join(__dirname, '../../../docs/contracts'),
    // Compiled output under dist/
    path.join(__dirname, '../../../../docs/contracts'),
    path.join(process.cwd(), 'docs/contracts'),
  ];
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function loadSchema(fileName: string): SchemaObject {
  for (const dir of schemaDirectories()) {
    const schemaPath = path.join(dir, fileName);
    if (fs.existsSync(schemaPath)) {
      const parsed: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
      if (isSchemaObject(parsed)) return parsed;
      throw new Error(`Schema ${schemaPath} is not a JSON object`);
    }
  }
  throw new Error(`Schema file not found: ${fileName}`);
}

/**
 * Register every contract schema under its $id (the file name) so the
 * schemas can $ref each other.
 */
function ensureSchemasLoaded(): void {
  if (schemasLoaded) return;
  for (const fileName of Object.values(SCHEMA_FILES)) {
    ajv.addSchema(loadSchema(fileName));
  }
  schemasLoaded = true;
}

function getValidator(key: SchemaKey): ValidateFunction {
  ensureSchemasLoaded();
  const validate = ajv.getSchema(SCHEMA_FILES[key]);
  if (!validate) throw new Error(`Schema not registered: ${SCHEMA_FILES[key]}`);
  return validate;
}

export interface ValidationResult {
  valid: boolean;
  errors?: string[];
}

function runValidation(key: SchemaKey, label: string, data: unknown): ValidationResult {
  const validate = getValidator(key);
  if (validate(data)) return { valid: true };

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${label} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate an AumExtractionResult against aum_extraction_result.schema.json
 */
export function validateAumResult(data: unknown): ValidationResult {
  return runValidation('aumResult', 'AumExtractionResult', data);
}

/**
 * Validate a persist_aum job payload against persist_aum_job.schema.json
 */
export function validatePersistJob(data: unknown): ValidationResult {
  return runValidation('persistJob', 'PersistAumJob', data);
}
