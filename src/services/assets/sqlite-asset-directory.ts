// SQLite-backed asset directory
// better-sqlite3 is synchronous, so each call completes without interleaving with other runs

import { asc, eq } from 'drizzle-orm';
import { schema, type Db } from '../../db/index.js';
import { AssetSchema, summarizeAsset, type Asset, type AssetDirectory, type AssetInput, type AssetSummary } from './types.js';

type AssetRow = typeof schema.assets.$inferSelect;

function rowToAsset(row: AssetRow): Asset {
  const asset: Asset = {
    name: row.name,
    host: row.host,
    port: row.port,
    username: row.username,
    metadata: row.metadata ?? {},
  };
  if (row.password) asset.password = row.password;
  if (row.privateKeyPath) asset.privateKeyPath = row.privateKeyPath;
  if (row.description) asset.description = row.description;
  if (row.groupId !== null) asset.groupId = row.groupId;
  return asset;
}

export class SqliteAssetDirectory implements AssetDirectory {
  constructor(private db: Db) {}

  async list(): Promise<AssetSummary[]> {
    const rows = this.db.select().from(schema.assets).orderBy(asc(schema.assets.name)).all();
    return rows.map(row => summarizeAsset(rowToAsset(row)));
  }

  async get(name: string): Promise<Asset | undefined> {
    const row = this.db.select().from(schema.assets).where(eq(schema.assets.name, name)).get();
    return row ? rowToAsset(row) : undefined;
  }

  async upsert(input: AssetInput): Promise<Asset> {
    const asset = AssetSchema.parse(input);
    const now = new Date().toISOString();
    const values = {
      host: asset.host,
      port: asset.port,
      username: asset.username,
      password: asset.password ?? null,
      privateKeyPath: asset.privateKeyPath ?? null,
      description: asset.description ?? null,
      groupId: asset.groupId ?? null,
      metadata: asset.metadata,
      updatedAt: now,
    };

    this.db
      .insert(schema.assets)
      .values({ name: asset.name, ...values, createdAt: now })
      .onConflictDoUpdate({ target: schema.assets.name, set: values })
      .run();

    return asset;
  }

  async delete(name: string): Promise<boolean> {
    const result = this.db.delete(schema.assets).where(eq(schema.assets.name, name)).run();
    return result.changes > 0;
  }
}
