/**
 * Validate the task JSON Schemas in src/contracts/schemas/
 * (task-create, task-update, seed-tasks). Compiles each with Ajv in strict
 * mode with union types allowed, as the nullable task fields need them.
 */

import Ajv from 'ajv';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';

const AjvClass = Ajv.default ?? Ajv;
const ajv = new AjvClass({
  allErrors: true,
  strict: true,
  strictSchema: true,
  allowUnionTypes: true,
});

const schemasDir = join(process.cwd(), 'src', 'contracts', 'schemas');
const files = readdirSync(schemasDir).filter((f) => f.endsWith('.json'));

const REQUIRED_SCHEMAS = ['task-create.json', 'task-update.json', 'seed-tasks.json'];

let failed = false;

for (const required of REQUIRED_SCHEMAS) {
  if (!files.includes(required)) {
    console.error(`✗ ${required}: missing from src/contracts/schemas/`);
    failed = true;
  }
}

for (const file of files) {
  const filePath = join(schemasDir, file);
  try {
    const schema: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
    if (typeof schema !== 'object' || schema === null || Array.isArray(schema)) {
      throw new Error('schema root must be an object');
    }
    ajv.compile(schema);
    console.log(`✓ ${file}`);
  } catch (err) {
    console.error(`✗ ${file}: ${err instanceof Error ? err.message : String(err)}`);
    failed = true;
  }
}

if (failed) {
  console.error('\nSchema validation failed.');
  process.exit(1);
} else {
  console.log(`\nAll ${files.length} schema(s) valid.`);
  process.exit(0);
}
