import Database from "better-sqlite3";
import {
  ADDRESS_FIELDS,
  ORG_ID_FIELDS,
  PLATFORM_FIELD,
  AttributionBackend,
  AttributionDataset,
  attributionHit,
} from "./attribution-dataset";
import { AttributionHit } from "../../models/enriched-record";
import { DatasetLoadError, errorMessage } from "../../errors";

interface TableLayout {
  table: string;
  addressColumn: string;
  orgIdColumn: string;
  hasPlatform: boolean;
}

interface MatchedRow {
  org_id: unknown;
  platform: unknown;
}

const quoteIdent = (name: string): string => `"${name.replace(/"/g, '""')}"`;

/**
 * Pick the first table (by name) holding an address column and an
 * organization id column
 */
export function detectLayout(db: Database.Database): TableLayout | null {
  const tables = db
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  for (const { name } of tables) {
    const columns = db
      .prepare<[], { name: string }>(`PRAGMA table_info(${quoteIdent(name)})`)
      .all()
      .map((column) => column.name);

    const addressColumn = ADDRESS_FIELDS.find((c) => columns.includes(c));
    const orgIdColumn = ORG_ID_FIELDS.find((c) => columns.includes(c));
    if (addressColumn && orgIdColumn) {
      return {
        table: name,
        addressColumn,
        orgIdColumn,
        hasPlatform: columns.includes(PLATFORM_FIELD),
      };
    }
  }

  return null;
}

/**
 * Attribution table in a SQLite file, queried by exact address
 */
export class SqliteDataset implements AttributionDataset {
  readonly encoding = "relational";
  private readonly statement: Database.Statement<[string], MatchedRow>;

  constructor(
    readonly name: string,
    private readonly db: Database.Database,
    layout: TableLayout
  ) {
    const platform = layout.hasPlatform ? quoteIdent(PLATFORM_FIELD) : "NULL";
    // Lowest rowid wins when an address appears more than once
    this.statement = db.prepare<[string], MatchedRow>(
      `SELECT ${quoteIdent(layout.orgIdColumn)} AS org_id, ${platform} AS platform
       FROM ${quoteIdent(layout.table)}
       WHERE ${quoteIdent(layout.addressColumn)} = ?
       ORDER BY rowid
       LIMIT 1`
    );
  }

  async lookup(address: string): Promise<AttributionHit | null> {
    const row = this.statement.get(address);
    return row ? attributionHit(row.org_id, row.platform) : null;
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}

export const sqliteBackend: AttributionBackend = {
  encoding: "relational",
  suffixes: [".sqlite3", ".sqlite", ".db"],

  async open(filePath: string, name: string): Promise<AttributionDataset> {
    let db: Database.Database | null = null;
    try {
      db = new Database(filePath, { readonly: true, fileMustExist: true });
      const layout = detectLayout(db);
      if (!layout) {
        throw new Error("no table with address and org_id columns");
      }
      return new SqliteDataset(name, db, layout);
    } catch (error) {
      db?.close();
      throw new DatasetLoadError(filePath, errorMessage(error));
    }
  },
};
