// Asset routes
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { AppError, TransportError } from '../utils/errors.js';
import type { AssetGroupStore } from '../services/assets/asset-group-store.js';
import {
  AssetPatchSchema,
  AssetPayloadSchema,
  applyAssetPatch,
  payloadToAsset,
  summaryToPayload,
} from '../services/assets/payload.js';
import { summarizeAsset, type AssetDirectory } from '../services/assets/types.js';
import type { RemoteExecutor } from '../services/remote/ssh-executor.js';
import { requireAuthIfEnabled } from '../security/route-guards.js';

export interface AssetRoutesOptions {
  assets: AssetDirectory;
  groups: AssetGroupStore;
  executor: RemoteExecutor;
}

const ListQuerySchema = z.object({
  group_id: z.coerce.number().int().positive().optional(),
});

const UploadSchema = z.object({
  remote_path: z.string().trim().min(1),
  content_base64: z.string().regex(/^[A-Za-z0-9+/=\s]*$/, 'content_base64 must be base64'),
});

type NameParams = { Params: { name: string } };

export const assetRoutes: FastifyPluginAsync<AssetRoutesOptions> = async (server, opts) => {
  const { assets, groups, executor } = opts;

  async function requireGroup(groupId: number | null | undefined): Promise<void> {
    if (groupId === undefined || groupId === null) return;
    if (!(await groups.get(groupId))) {
      throw AppError.badRequest(`Asset group ${groupId} not found`);
    }
  }

  server.addHook('onRequest', async (request, reply) => {
    if (!requireAuthIfEnabled(request, reply)) {
      return reply;
    }
  });

  // GET /v1/assets - List assets (no secrets); group_id narrows to that group and its subgroups
  server.get('/assets', async (request) => {
    const query = ListQuerySchema.parse(request.query);
    let list = await assets.list();
    if (query.group_id !== undefined) {
      const ids = new Set(await groups.descendantIds(query.group_id));
      list = list.filter(asset => asset.groupId !== undefined && ids.has(asset.groupId));
    }
    return { assets: list.map(summaryToPayload) };
  });

  // GET /v1/assets/:name
  server.get<NameParams>('/assets/:name', async (request) => {
    const asset = await assets.get(request.params.name);
    if (!asset) {
      throw AppError.notFound(`Asset "${request.params.name}" not found`);
    }
    return { asset: summaryToPayload(summarizeAsset(asset)) };
  });

  // POST /v1/assets - Create an asset
  server.post('/assets', async (request, reply) => {
    const body = AssetPayloadSchema.parse(request.body);
    if (await assets.get(body.name)) {
      throw AppError.conflict(`Asset "${body.name}" already exists`);
    }
    await requireGroup(body.group_id);

    const asset = await assets.upsert(payloadToAsset(body));
    return reply.code(201).send({ asset: summaryToPayload(summarizeAsset(asset)) });
  });

  // PUT /v1/assets/:name - Update the fields given; credentials left out are kept
  server.put<NameParams>('/assets/:name', async (request) => {
    const patch = AssetPatchSchema.parse(request.body);
    const current = await assets.get(request.params.name);
    if (!current) {
      throw AppError.notFound(`Asset "${request.params.name}" not found`);
    }
    await requireGroup(patch.group_id);

    const asset = await assets.upsert(applyAssetPatch(current, patch));
    return { asset: summaryToPayload(summarizeAsset(asset)) };
  });

  // DELETE /v1/assets/:name
  server.delete<NameParams>('/assets/:name', async (request) => {
    const removed = await assets.delete(request.params.name);
    if (!removed) {
      throw AppError.notFound(`Asset "${request.params.name}" not found`);
    }
    return { ok: true };
  });

  // POST /v1/assets/:name/upload - Push a file to the asset
  server.post<NameParams>('/assets/:name/upload', { bodyLimit: 16 * 1024 * 1024 }, async (request) => {
    const body = UploadSchema.parse(request.body);
    const asset = await assets.get(request.params.name);
    if (!asset) {
      throw AppError.notFound(`Asset "${request.params.name}" not found`);
    }

    const content = Buffer.from(body.content_base64, 'base64');
    try {
      await executor.push(asset, content, body.remote_path);
    } catch (error) {
      if (error instanceof TransportError) {
        throw AppError.badGateway(error.message);
      }
      throw error;
    }

    return { ok: true, asset_name: asset.name, remote_path: body.remote_path, bytes: content.length };
  });
};
