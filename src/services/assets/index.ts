export { InMemoryAssetDirectory } from './in-memory-asset-directory.js';
export { SqliteAssetDirectory } from './sqlite-asset-directory.js';
export { AssetGroupStore, buildGroupTree, descendantIds, releaseGroupAssets } from './asset-group-store.js';
export type { AssetGroupInput, AssetGroupPatch } from './asset-group-store.js';
export { seedAssetsFromFile } from './seed.js';
export {
  AssetPatchSchema,
  AssetPayloadSchema,
  GroupPatchSchema,
  GroupPayloadSchema,
  applyAssetPatch,
  groupToPayload,
  groupTreeToPayload,
  payloadToAsset,
  summaryToPayload,
} from './payload.js';
export type { AssetPatch, AssetPayload, GroupPatch, GroupPayload } from './payload.js';
export { AssetSchema, authMethodOf, renderAssetList, summarizeAsset } from './types.js';
export type {
  Asset,
  AssetDirectory,
  AssetGroup,
  AssetGroupNode,
  AssetInput,
  AssetSummary,
  AuthMethod,
} from './types.js';
