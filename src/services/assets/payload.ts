// Wire format for assets and groups (snake_case, as the HTTP API and seed files use)

import { z } from 'zod';
import type { Asset, AssetGroup, AssetGroupNode, AssetInput, AssetSummary } from './types.js';

export const AssetPayloadSchema = z.object({
  name: z.string(),
  host: z.string(),
  port: z.number().int().optional(),
  username: z.string(),
  password: z.string().optional(),
  private_key_path: z.string().optional(),
  description: z.string().optional(),
  metadata: z.record(z.string()).optional(),
  group_id: z.number().int().positive().nullable().optional(),
});

export type AssetPayload = z.infer<typeof AssetPayloadSchema>;

/** Partial update: omitted fields are kept, an empty string clears, `group_id: null` ungroups. */
export const AssetPatchSchema = AssetPayloadSchema.omit({ name: true }).partial();

export type AssetPatch = z.infer<typeof AssetPatchSchema>;

export function payloadToAsset(payload: AssetPayload): AssetInput {
  return {
    name: payload.name,
    host: payload.host,
    port: payload.port,
    username: payload.username,
    password: payload.password || undefined,
    privateKeyPath: payload.private_key_path || undefined,
    description: payload.description,
    metadata: payload.metadata,
    groupId: payload.group_id ?? undefined,
  };
}

export function applyAssetPatch(current: Asset, patch: AssetPatch): AssetInput {
  const next: AssetInput = { ...current, metadata: { ...current.metadata } };

  if (patch.host !== undefined) next.host = patch.host;
  if (patch.port !== undefined) next.port = patch.port;
  if (patch.username !== undefined) next.username = patch.username;
  if (patch.description !== undefined) next.description = patch.description || undefined;
  if (patch.metadata !== undefined) next.metadata = patch.metadata;
  if (patch.group_id !== undefined) next.groupId = patch.group_id ?? undefined;

  // Setting one credential replaces the other
  if (patch.password !== undefined) {
    next.password = patch.password || undefined;
    if (patch.password && patch.private_key_path === undefined) next.privateKeyPath = undefined;
  }
  if (patch.private_key_path !== undefined) {
    next.privateKeyPath = patch.private_key_path || undefined;
    if (patch.private_key_path && patch.password === undefined) next.password = undefined;
  }

  return next;
}

export function summaryToPayload(summary: AssetSummary) {
  return {
    name: summary.name,
    host: summary.host,
    port: summary.port,
    username: summary.username,
    description: summary.description ?? null,
    group_id: summary.groupId ?? null,
    metadata: summary.metadata,
    auth_method: summary.authMethod,
  };
}

export const GroupPayloadSchema = z.object({
  name: z.string().trim().min(1).max(100),
  sort_order: z.number().int().optional(),
  remark: z.string().max(500).optional(),
  parent_id: z.number().int().positive().nullable().optional(),
});

export const GroupPatchSchema = GroupPayloadSchema.partial();

export type GroupPayload = z.infer<typeof GroupPayloadSchema>;
export type GroupPatch = z.infer<typeof GroupPatchSchema>;

export function groupToPayload(group: AssetGroup) {
  return {
    id: group.id,
    name: group.name,
    sort_order: group.sortOrder,
    remark: group.remark,
    parent_id: group.parentId,
  };
}

export type GroupTreePayload = ReturnType<typeof groupToPayload> & { children: GroupTreePayload[] };

export function groupTreeToPayload(node: AssetGroupNode): GroupTreePayload {
  return { ...groupToPayload(node), children: node.children.map(groupTreeToPayload) };
}
