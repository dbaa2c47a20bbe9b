import { readFileSync } from 'node:fs';
import Ajv from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

export type SchemaName = 'map' | 'scenario' | 'edits' | 'savestate' | 'prebaked';

const SCHEMA_NAMES: readonly SchemaName[] = ['map', 'scenario', 'edits', 'savestate', 'prebaked'];

const schemaId = (name: SchemaName) => `citysim/${name}.schema.json`;

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let shared: Ajv | undefined;

// Each schema registers under its own $id; savestates refer to the edits schema.
function ajv(): Ajv {
  if (shared) return shared;
  const instance = new Ajv({ strict: false, allErrors: true });
  for (const name of SCHEMA_NAMES) {
    const url = new URL(`../../schema/${name}.schema.json`, import.meta.url);
    const schema: unknown = JSON.parse(readFileSync(url, 'utf8'));
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema ${name} is not an object`);
    }
    instance.addSchema(schema);
  }
  shared = instance;
  return instance;
}

export function compileSchema<T>(name: SchemaName): ValidateFunction<T> {
  const validate = ajv().getSchema<T>(schemaId(name));
  if (!validate) {
    throw new Error(`Unknown schema ${name}`);
  }
  return validate;
}

export function formatErrors(errors: readonly ErrorObject[] | null | undefined): string {
  const details = (errors ?? [])
    .map((error) => `${error.instancePath || '(root)'} ${error.message ?? ''}`.trim())
    .join('; ');
  return details || 'unknown error';
}
