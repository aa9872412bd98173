// Asset resolution shared by the tools that act on a host

import type { Asset } from '../assets/types.js';
import type { ToolArguments, ToolContext } from './types.js';

export type TargetResolution =
  | { ok: true; asset: Asset }
  | { ok: false; error: string };

export function stringArg(args: ToolArguments, name: string): string {
  const value = args[name];
  return typeof value === 'string' ? value : '';
}

export async function resolveTarget(assetName: string, context: ToolContext): Promise<TargetResolution> {
  const name = assetName.trim();
  const allowed = context.allowedAssetNames;

  if (allowed && !allowed.has(name)) {
    const names = Array.from(allowed).sort().join(', ') || '(none)';
    return {
      ok: false,
      error: `Asset "${name}" is not allowed for this request. Allowed assets: ${names}`,
    };
  }

  const asset = await context.assets.get(name);
  if (!asset) {
    return {
      ok: false,
      error: `Asset "${name}" not found. Call list_assets to see the configured assets.`,
    };
  }

  return { ok: true, asset };
}
