// Load assets from a JSON file at startup (ASSETS_FILE)

import { readFile } from 'fs/promises';
import { z } from 'zod';
import type { AssetDirectory } from './types.js';
import { AssetPayloadSchema, payloadToAsset } from './payload.js';

const AssetFileSchema = z.union([
  z.array(AssetPayloadSchema),
  z.object({ assets: z.array(AssetPayloadSchema) }).transform(file => file.assets),
]);

/** Returns the number of assets written. */
export async function seedAssetsFromFile(directory: AssetDirectory, path: string): Promise<number> {
  const raw = await readFile(path, 'utf8');
  const parsed = AssetFileSchema.parse(JSON.parse(raw));

  for (const payload of parsed) {
    await directory.upsert(payloadToAsset(payload));
  }
  return parsed.length;
}
