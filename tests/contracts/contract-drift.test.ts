/**
 * Contract Drift Detection Tests
 *
 * Validates that the task JSON Schemas (source of truth) remain aligned
 * with their definitions in docs/api/openapi.yaml.
 *
 * Compares: required arrays, properties keys and enum values.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asRecord(value: unknown, label: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error(`${label} is not an object`);
  }
  return value;
}

function resolve(dotPath: string, root: unknown): Record<string, unknown> {
  let current = root;
  for (const part of dotPath.split('.')) {
    current = asRecord(current, `Path "${dotPath}" at "${part}"`)[part];
  }
  return asRecord(current, `Path "${dotPath}"`);
}

function sortedStrings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string').sort() : [];
}

function sortedKeys(value: unknown): string[] {
  return isRecord(value) ? Object.keys(value).sort() : [];
}

function enumOf(schema: Record<string, unknown>, property: string): string[] {
  const props = schema.properties;
  if (!isRecord(props)) return [];
  const prop = props[property];
  return isRecord(prop) ? sortedStrings(prop.enum) : [];
}

// ---------------------------------------------------------------------------
// Schema loading
// ---------------------------------------------------------------------------

let createJson: Record<string, unknown>;
let updateJson: Record<string, unknown>;
let openapiCreate: Record<string, unknown>;
let openapiUpdate: Record<string, unknown>;
let openapiStatus: Record<string, unknown>;
let openapiPriority: Record<string, unknown>;

beforeAll(() => {
  const root = process.cwd();
  const readJson = (file: string): Record<string, unknown> =>
    asRecord(JSON.parse(readFileSync(join(root, 'src/contracts/schemas', file), 'utf-8')), file);

  createJson = readJson('task-create.json');
  updateJson = readJson('task-update.json');

  const openapi: unknown = YAML.parse(readFileSync(join(root, 'docs/api/openapi.yaml'), 'utf-8'));
  openapiCreate = resolve('components.schemas.TaskCreate', openapi);
  openapiUpdate = resolve('components.schemas.TaskUpdate', openapi);
  openapiStatus = resolve('components.schemas.TaskStatus', openapi);
  openapiPriority = resolve('components.schemas.TaskPriority', openapi);
});

describe('TaskCreate contract drift', () => {
  it('required fields match', () => {
    expect(sortedStrings(createJson.required)).toEqual(sortedStrings(openapiCreate.required));
  });

  it('properties keys match', () => {
    expect(sortedKeys(createJson.properties)).toEqual(sortedKeys(openapiCreate.properties));
  });

  it('status and priority enums match', () => {
    expect(enumOf(createJson, 'status')).toEqual(enumOf(openapiCreate, 'status'));
    expect(enumOf(createJson, 'priority')).toEqual(enumOf(openapiCreate, 'priority'));
  });
});

describe('TaskUpdate contract drift', () => {
  it('properties keys match', () => {
    expect(sortedKeys(updateJson.properties)).toEqual(sortedKeys(openapiUpdate.properties));
  });

  it('requires at least one field in both sources', () => {
    expect(updateJson.minProperties).toBe(1);
    expect(openapiUpdate.minProperties).toBe(1);
  });

  it('status and priority enums match', () => {
    expect(enumOf(updateJson, 'status')).toEqual(enumOf(openapiUpdate, 'status'));
    expect(enumOf(updateJson, 'priority')).toEqual(enumOf(openapiUpdate, 'priority'));
  });
});

describe('Shared enums', () => {
  it('TaskStatus and TaskPriority components match the JSON Schema enums', () => {
    expect(sortedStrings(openapiStatus.enum)).toEqual(enumOf(createJson, 'status'));
    expect(sortedStrings(openapiPriority.enum)).toEqual(enumOf(createJson, 'priority'));
  });
});
