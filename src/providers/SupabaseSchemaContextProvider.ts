/**
 * Schema context read from the database catalogue through the
 * `describe_schema` RPC, cached for `ttlMs`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  ISchemaContextProvider,
  SchemaContext,
  SchemaTable,
} from './ISchemaContextProvider.js';

interface SchemaColumnRow {
  table_name: string;
  column_name: string;
  data_type: string;
}

const DEFAULT_TTL_MS = 10 * 60 * 1000;

export class SupabaseSchemaContextProvider implements ISchemaContextProvider {
  private cached: { schema: SchemaContext; expiresAt: number } | null = null;

  constructor(
    private readonly db: SupabaseClient,
    private readonly ttlMs = DEFAULT_TTL_MS
  ) {}

  async getSchemaContext(): Promise<SchemaContext> {
    if (this.cached && this.cached.expiresAt > Date.now()) {
      return this.cached.schema;
    }

    const { data, error } = await this.db.rpc('describe_schema');
    if (error) throw new Error(`Failed to describe schema: ${error.message}`);

    const schema = groupColumns((data ?? []) as SchemaColumnRow[]);
    this.cached = { schema, expiresAt: Date.now() + this.ttlMs };
    return schema;
  }
}

function groupColumns(rows: SchemaColumnRow[]): SchemaContext {
  const tables = new Map<string, SchemaTable>();
  for (const row of rows) {
    let table = tables.get(row.table_name);
    if (!table) {
      table = { name: row.table_name, columns: [] };
      tables.set(row.table_name, table);
    }
    table.columns.push({ name: row.column_name, type: row.data_type });
  }
  return { tables: [...tables.values()] };
}
