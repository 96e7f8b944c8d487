import { DbConnection } from "../db/postgres.client";

export type ColumnInfo = {
  name: string;
  dataType: string;
  udtName: string;
  isNullable: boolean;
};

export type TableInfo = {
  schema: string;
  name: string;
  columns: ColumnInfo[];
  primaryKey: string[];
};

type TableRow = { table_schema: string; table_name: string };
type ColumnRow = { column_name: string; data_type: string; udt_name: string; is_nullable: string };
type KeyRow = { column_name: string };

export async function readSchema(client: DbConnection, schema: string): Promise<TableInfo[]> {
  const tablesRes = await client.query<TableRow>(
    `
    SELECT table_schema, table_name
    FROM information_schema.tables
    WHERE table_type = 'BASE TABLE'
      AND table_schema = $1
    ORDER BY table_name
  `,
    [schema]
  );

  const tables: TableInfo[] = [];
  for (const t of tablesRes.rows) {
    const colsRes = await client.query<ColumnRow>(
      `
      SELECT column_name, data_type, udt_name, is_nullable
      FROM information_schema.columns
      WHERE table_schema = $1 AND table_name = $2
      ORDER BY ordinal_position
    `,
      [t.table_schema, t.table_name]
    );

    const keyRes = await client.query<KeyRow>(
      `
      SELECT kcu.column_name
      FROM information_schema.table_constraints tc
      JOIN information_schema.key_column_usage kcu
        ON tc.constraint_name = kcu.constraint_name
       AND tc.table_schema = kcu.table_schema
      WHERE tc.constraint_type = 'PRIMARY KEY'
        AND tc.table_schema = $1 AND tc.table_name = $2
      ORDER BY kcu.ordinal_position
    `,
      [t.table_schema, t.table_name]
    );

    tables.push({
      schema: t.table_schema,
      name: t.table_name,
      columns: colsRes.rows.map((r) => ({
        name: r.column_name,
        dataType: r.data_type,
        udtName: r.udt_name,
        isNullable: r.is_nullable === "YES",
      })),
      primaryKey: keyRes.rows.map((r) => r.column_name),
    });
  }

  return tables;
}
