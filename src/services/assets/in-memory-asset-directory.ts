import { AssetSchema, summarizeAsset, type Asset, type AssetDirectory, type AssetInput, type AssetSummary } from './types.js';

export class InMemoryAssetDirectory implements AssetDirectory {
  private assets = new Map<string, Asset>();

  constructor(initial: AssetInput[] = []) {
    for (const asset of initial) {
      const parsed = AssetSchema.parse(asset);
      this.assets.set(parsed.name, parsed);
    }
  }

  async list(): Promise<AssetSummary[]> {
    return Array.from(this.assets.values())
      .sort((a, b) => a.name.localeCompare(b.name))
      .map(summarizeAsset);
  }

  async get(name: string): Promise<Asset | undefined> {
    const asset = this.assets.get(name);
    return asset ? { ...asset, metadata: { ...asset.metadata } } : undefined;
  }

  async upsert(input: AssetInput): Promise<Asset> {
    const asset = AssetSchema.parse(input);
    this.assets.set(asset.name, asset);
    return { ...asset };
  }

  async delete(name: string): Promise<boolean> {
    return this.assets.delete(name);
  }
}
