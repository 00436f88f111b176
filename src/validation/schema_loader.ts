/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export interface Schema {
  $schema: string;
  $id: string;
  type: string;
  required?: string[];
  properties?: Record<string, unknown>;
}

export type SchemaName = 'engine_config.v1' | 'input_bundle.v1' | 'verdict_report.v1';

const schemaCache = new Map<SchemaName, Schema>();

export function loadSchema(schemaName: SchemaName): Schema {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema: Schema = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}
