/**
 * Schema context collaborator.
 * Supplies the table/column description the backends generate against.
 */

export interface SchemaColumn {
  name: string;
  type: string;
}

export interface SchemaTable {
  name: string;
  columns: SchemaColumn[];
}

export interface SchemaContext {
  tables: SchemaTable[];
}

export interface ISchemaContextProvider {
  getSchemaContext(): Promise<SchemaContext>;
}

/** Render a schema the way both backends expect it in prompts. */
export function formatSchemaContext(schema: SchemaContext): string {
  if (schema.tables.length === 0) return '(schema unavailable)';
  return schema.tables
    .map((t) => {
      const cols = t.columns.map((c) => `${c.name} (${c.type})`).join(', ');
      return `Table: ${t.name}\nColumns: ${cols}`;
    })
    .join('\n\n');
}
