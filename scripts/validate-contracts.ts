/**
 * Validate contract alignment between JSON Schemas (source of truth)
 * and their corresponding definitions in the OpenAPI document.
 *
 * Compares: required arrays, properties keys and enum values.
 *
 * Exit code 0 = all aligned, 1 = mismatches detected.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface SchemaShape {
  required: string[];
  properties: Record<string, { enum: string[] }>;
}

interface ContractMapping {
  jsonSchemaId: string;
  openapiName: string; // key under components.schemas
}

interface Mismatch {
  schema: string;
  field: string;
  sourceValue: string;
  targetValue: string;
}

// ---------------------------------------------------------------------------
// Config
// ---------------------------------------------------------------------------

const MAPPING: ContractMapping[] = [
  { jsonSchemaId: 'task-create', openapiName: 'TaskCreate' },
  { jsonSchemaId: 'task-update', openapiName: 'TaskUpdate' },
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

/**
 * Reduce a parsed schema object to the parts that are compared.
 */
function toShape(value: unknown): SchemaShape | undefined {
  if (!isRecord(value)) return undefined;
  const properties: SchemaShape['properties'] = {};
  if (isRecord(value.properties)) {
    for (const [key, prop] of Object.entries(value.properties)) {
      properties[key] = { enum: isRecord(prop) ? stringArray(prop.enum) : [] };
    }
  }
  return { required: stringArray(value.required), properties };
}

function getPath(root: unknown, dotPath: string): unknown {
  let current = root;
  for (const part of dotPath.split('.')) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

function sortedJson(arr: string[]): string {
  return JSON.stringify([...arr].sort());
}

function compareSets(a: string[], b: string[], field: string, schema: string, mismatches: Mismatch[]): void {
  const sortedA = sortedJson(a);
  const sortedB = sortedJson(b);
  if (sortedA !== sortedB) {
    mismatches.push({ schema, field, sourceValue: sortedA, targetValue: sortedB });
  }
}

function compareSchemas(jsonSchema: SchemaShape, apiSchema: SchemaShape, schema: string, mismatches: Mismatch[]): void {
  compareSets(jsonSchema.required, apiSchema.required, 'required', schema, mismatches);

  const jsonProps = Object.keys(jsonSchema.properties);
  const apiProps = Object.keys(apiSchema.properties);
  compareSets(jsonProps, apiProps, 'properties', schema, mismatches);

  for (const key of jsonProps) {
    const jsonProp = jsonSchema.properties[key];
    const apiProp = apiSchema.properties[key];
    if (!jsonProp || !apiProp) continue;
    compareSets(jsonProp.enum, apiProp.enum, `${key}.enum`, schema, mismatches);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const schemasDir = join(process.cwd(), 'src', 'contracts', 'schemas');
const openapiPath = join(process.cwd(), 'docs', 'api', 'openapi.yaml');

// Load JSON Schemas keyed by $id
const jsonSchemas = new Map<string, SchemaShape>();
for (const file of readdirSync(schemasDir).filter((f) => f.endsWith('.json'))) {
  const content: unknown = JSON.parse(readFileSync(join(schemasDir, file), 'utf-8'));
  const shape = toShape(content);
  if (isRecord(content) && typeof content.$id === 'string' && shape) {
    jsonSchemas.set(content.$id, shape);
  }
}

const openapi: unknown = YAML.parse(readFileSync(openapiPath, 'utf-8'));

const mismatches: Mismatch[] = [];
const warnings: string[] = [];

for (const mapping of MAPPING) {
  const jsonSchema = jsonSchemas.get(mapping.jsonSchemaId);
  if (!jsonSchema) {
    warnings.push(`⚠ No JSON Schema found with $id="${mapping.jsonSchemaId}" (skipping)`);
    continue;
  }

  const apiSchema = toShape(getPath(openapi, `components.schemas.${mapping.openapiName}`));
  if (!apiSchema) {
    mismatches.push({
      schema: mapping.jsonSchemaId,
      field: 'schema',
      sourceValue: 'exists',
      targetValue: `components.schemas.${mapping.openapiName} missing`,
    });
    continue;
  }

  compareSchemas(jsonSchema, apiSchema, mapping.jsonSchemaId, mismatches);
  console.log(`✓ ${mapping.jsonSchemaId} ↔ openapi.yaml (${mapping.openapiName})`);
}

for (const id of jsonSchemas.keys()) {
  if (!MAPPING.some((m) => m.jsonSchemaId === id)) {
    warnings.push(`⚠ JSON Schema "$id=${id}" has no OpenAPI mapping`);
  }
}

if (warnings.length > 0) {
  console.log('');
  for (const w of warnings) {
    console.log(w);
  }
}

if (mismatches.length > 0) {
  console.error('\n✗ Contract mismatches detected:\n');
  for (const m of mismatches) {
    console.error(`  Schema: ${m.schema}`);
    console.error(`  Field:  ${m.field}`);
    console.error(`  JSON Schema: ${m.sourceValue}`);
    console.error(`  OpenAPI:     ${m.targetValue}`);
    console.error('');
  }
  console.error(`${mismatches.length} mismatch(es) found.`);
  process.exit(1);
} else {
  console.log(`\nAll contracts aligned (${MAPPING.length} mappings verified).`);
  process.exit(0);
}
