// Asset types and validation
// An asset is one Linux host the assistant may run commands on

import { z } from 'zod';

const ASSET_NAME_PATTERN = /^[A-Za-z0-9._-]+$/;

const assetFields = {
  name: z.string().min(1).max(64).regex(ASSET_NAME_PATTERN, 'Asset names may only contain letters, digits, ".", "_" and "-"'),
  host: z.string().trim().min(1),
  port: z.number().int().min(1).max(65535).default(22),
  username: z.string().trim().min(1),
  password: z.string().min(1).optional(),
  privateKeyPath: z.string().min(1).optional(),
  description: z.string().max(500).optional(),
  groupId: z.number().int().positive().optional(),
  metadata: z.record(z.string()).default({}),
};

export const AssetSchema = z
  .object(assetFields)
  .refine(asset => !(asset.password && asset.privateKeyPath), {
    message: 'Specify either password or private_key_path, not both',
    path: ['password'],
  });

export type Asset = z.infer<typeof AssetSchema>;
export type AssetInput = z.input<typeof AssetSchema>;

export type AuthMethod = 'password' | 'private_key' | 'none';

/** Asset as exposed to the model and API clients: no secrets. */
export interface AssetSummary {
  name: string;
  host: string;
  port: number;
  username: string;
  description?: string;
  groupId?: number;
  metadata: Record<string, string>;
  authMethod: AuthMethod;
}

/** A folder of assets. Groups nest through parentId; null is a top-level group. */
export interface AssetGroup {
  id: number;
  name: string;
  sortOrder: number;
  remark: string;
  parentId: number | null;
}

export interface AssetGroupNode extends AssetGroup {
  children: AssetGroupNode[];
}

/**
 * Directory of known hosts. Implementations must be safe to call from
 * concurrent runs; the loop only reads from it.
 */
export interface AssetDirectory {
  list(): Promise<AssetSummary[]>;
  get(name: string): Promise<Asset | undefined>;
  upsert(asset: AssetInput): Promise<Asset>;
  delete(name: string): Promise<boolean>;
}

export function authMethodOf(asset: Pick<Asset, 'password' | 'privateKeyPath'>): AuthMethod {
  if (asset.password) return 'password';
  if (asset.privateKeyPath) return 'private_key';
  return 'none';
}

export function summarizeAsset(asset: Asset): AssetSummary {
  const summary: AssetSummary = {
    name: asset.name,
    host: asset.host,
    port: asset.port,
    username: asset.username,
    metadata: { ...asset.metadata },
    authMethod: authMethodOf(asset),
  };
  if (asset.description) summary.description = asset.description;
  if (asset.groupId !== undefined) summary.groupId = asset.groupId;
  return summary;
}

export function renderAssetList(assets: AssetSummary[]): string {
  if (assets.length === 0) {
    return 'No assets are configured.';
  }
  return assets
    .map(a => {
      const base = `- ${a.name}: ${a.username}@${a.host}:${a.port}`;
      return a.description ? `${base} (${a.description})` : base;
    })
    .join('\n');
}
