// Asset group routes
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AppError } from '../utils/errors.js';
import { AssetGroupStore, releaseGroupAssets } from '../services/assets/asset-group-store.js';
import {
  GroupPatchSchema,
  GroupPayloadSchema,
  groupToPayload,
  groupTreeToPayload,
} from '../services/assets/payload.js';
import type { AssetDirectory } from '../services/assets/types.js';
import { requireAuthIfEnabled } from '../security/route-guards.js';

export interface AssetGroupRoutesOptions {
  groups: AssetGroupStore;
  assets: AssetDirectory;
}

const GroupParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export const assetGroupRoutes: FastifyPluginAsync<AssetGroupRoutesOptions> = async (server, opts) => {
  const { groups, assets } = opts;

  server.addHook('onRequest', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
  });

  // GET /v1/asset-groups - Flat list, ordered by sort_order then name
  server.get('/asset-groups', async () => {
    const list = await groups.list();
    return { groups: list.map(groupToPayload) };
  });

  // GET /v1/asset-groups/tree
  server.get('/asset-groups/tree', async () => {
    const tree = await groups.tree();
    return { groups: tree.map(groupTreeToPayload) };
  });

  // GET /v1/asset-groups/:id
  server.get('/asset-groups/:id', async (request) => {
    const { id } = GroupParamsSchema.parse(request.params);
    const group = await groups.get(id);
    if (!group) {
      throw AppError.notFound(`Asset group ${id} not found`);
    }
    return { group: groupToPayload(group) };
  });

  // POST /v1/asset-groups
  server.post('/asset-groups', async (request, reply) => {
    const body = GroupPayloadSchema.parse(request.body);
    const group = await groups.create({
      name: body.name,
      sortOrder: body.sort_order,
      remark: body.remark,
      parentId: body.parent_id,
    });
    return reply.code(201).send({ group: groupToPayload(group) });
  });

  // PUT /v1/asset-groups/:id - Partial update; parent_id null moves the group to the top level
  server.put('/asset-groups/:id', async (request) => {
    const { id } = GroupParamsSchema.parse(request.params);
    const body = GroupPatchSchema.parse(request.body);
    const group = await groups.update(id, {
      name: body.name,
      sortOrder: body.sort_order,
      remark: body.remark,
      parentId: body.parent_id,
    });
    if (!group) {
      throw AppError.notFound(`Asset group ${id} not found`);
    }
    return { group: groupToPayload(group) };
  });

  // DELETE /v1/asset-groups/:id - Subgroups move up a level, assets become ungrouped
  server.delete('/asset-groups/:id', async (request) => {
    const { id } = GroupParamsSchema.parse(request.params);
    const removed = await groups.delete(id);
    if (!removed) {
      throw AppError.notFound(`Asset group ${id} not found`);
    }
    const ungrouped = await releaseGroupAssets(assets, id);
    request.log.info({ groupId: id, ungrouped }, 'Asset group deleted');
    return { ok: true, ungrouped_assets: ungrouped };
  });
};
