// Asset groups (SQLite)
// Groups form a tree through parent_id. Deleting a group moves its child groups up one level
// and leaves its assets ungrouped.

import { asc, eq } from 'drizzle-orm';
import { schema, type Db } from '../../db/index.js';
import { AppError } from '../../utils/errors.js';
import type { AssetDirectory, AssetGroup, AssetGroupNode } from './types.js';

export interface AssetGroupInput {
  name: string;
  sortOrder?: number;
  remark?: string;
  parentId?: number | null;
}

export type AssetGroupPatch = Partial<AssetGroupInput>;

type GroupRow = typeof schema.assetGroups.$inferSelect;

function rowToGroup(row: GroupRow): AssetGroup {
  return {
    id: row.id,
    name: row.name,
    sortOrder: row.sortOrder,
    remark: row.remark,
    parentId: row.parentId,
  };
}

function byOrder(a: AssetGroup, b: AssetGroup): number {
  return a.sortOrder - b.sortOrder || a.name.localeCompare(b.name);
}

export function buildGroupTree(groups: AssetGroup[]): AssetGroupNode[] {
  const nodes = new Map<number, AssetGroupNode>();
  for (const group of groups) {
    nodes.set(group.id, { ...group, children: [] });
  }

  const roots: AssetGroupNode[] = [];
  for (const node of nodes.values()) {
    const parent = node.parentId === null ? undefined : nodes.get(node.parentId);
    // A parent id that points nowhere makes the group top-level
    if (parent) parent.children.push(node);
    else roots.push(node);
  }

  const sortLevel = (level: AssetGroupNode[]) => {
    level.sort(byOrder);
    for (const node of level) sortLevel(node.children);
  };
  sortLevel(roots);
  return roots;
}

/** The group's own id followed by the ids of every group below it. */
export function descendantIds(groups: AssetGroup[], id: number): number[] {
  const children = new Map<number, number[]>();
  for (const group of groups) {
    if (group.parentId === null) continue;
    const siblings = children.get(group.parentId) ?? [];
    siblings.push(group.id);
    children.set(group.parentId, siblings);
  }

  const result: number[] = [];
  const seen = new Set<number>();
  const pending = [id];
  while (pending.length > 0) {
    const current = pending.shift();
    if (current === undefined || seen.has(current)) continue;
    seen.add(current);
    result.push(current);
    pending.push(...(children.get(current) ?? []));
  }
  return result;
}

/** Ungroup every asset of a group. Returns how many moved. */
export async function releaseGroupAssets(assets: AssetDirectory, groupId: number): Promise<number> {
  let moved = 0;
  for (const summary of await assets.list()) {
    if (summary.groupId !== groupId) continue;
    const asset = await assets.get(summary.name);
    if (!asset) continue;
    await assets.upsert({ ...asset, groupId: undefined });
    moved++;
  }
  return moved;
}

export class AssetGroupStore {
  constructor(private db: Db) {}

  async list(): Promise<AssetGroup[]> {
    return this.db
      .select()
      .from(schema.assetGroups)
      .orderBy(asc(schema.assetGroups.sortOrder), asc(schema.assetGroups.name))
      .all()
      .map(rowToGroup);
  }

  async tree(): Promise<AssetGroupNode[]> {
    return buildGroupTree(await this.list());
  }

  async get(id: number): Promise<AssetGroup | undefined> {
    const row = this.db.select().from(schema.assetGroups).where(eq(schema.assetGroups.id, id)).get();
    return row ? rowToGroup(row) : undefined;
  }

  async descendantIds(id: number): Promise<number[]> {
    return descendantIds(await this.list(), id);
  }

  async create(input: AssetGroupInput): Promise<AssetGroup> {
    this.assertNameFree(input.name);
    const parentId = input.parentId ?? null;
    if (parentId !== null) await this.requireParent(parentId);

    const row = this.db
      .insert(schema.assetGroups)
      .values({
        name: input.name,
        sortOrder: input.sortOrder ?? 0,
        remark: input.remark ?? '',
        parentId,
      })
      .returning()
      .get();
    if (!row) {
      throw AppError.internal(`Asset group "${input.name}" was not stored`);
    }
    return rowToGroup(row);
  }

  /** Returns undefined when the group does not exist. */
  async update(id: number, patch: AssetGroupPatch): Promise<AssetGroup | undefined> {
    const current = await this.get(id);
    if (!current) return undefined;

    if (patch.name !== undefined && patch.name !== current.name) {
      this.assertNameFree(patch.name);
    }
    if (patch.parentId !== undefined && patch.parentId !== null) {
      await this.requireParent(patch.parentId);
      if ((await this.descendantIds(id)).includes(patch.parentId)) {
        throw AppError.badRequest(`Group ${id} cannot be moved under itself or one of its subgroups`);
      }
    }

    const next = {
      name: patch.name ?? current.name,
      sortOrder: patch.sortOrder ?? current.sortOrder,
      remark: patch.remark ?? current.remark,
      parentId: patch.parentId === undefined ? current.parentId : patch.parentId,
    };
    this.db.update(schema.assetGroups).set(next).where(eq(schema.assetGroups.id, id)).run();
    return { id, ...next };
  }

  /** Returns the removed group, or undefined when there was none. */
  async delete(id: number): Promise<AssetGroup | undefined> {
    const group = await this.get(id);
    if (!group) return undefined;

    this.db.transaction(tx => {
      tx.update(schema.assetGroups)
        .set({ parentId: group.parentId })
        .where(eq(schema.assetGroups.parentId, id))
        .run();
      tx.delete(schema.assetGroups).where(eq(schema.assetGroups.id, id)).run();
    });
    return group;
  }

  private assertNameFree(name: string): void {
    const existing = this.db.select().from(schema.assetGroups).where(eq(schema.assetGroups.name, name)).get();
    if (existing) {
      throw AppError.conflict(`Asset group "${name}" already exists`);
    }
  }

  private async requireParent(parentId: number): Promise<void> {
    if (!(await this.get(parentId))) {
      throw AppError.badRequest(`Parent group ${parentId} not found`);
    }
  }
}
