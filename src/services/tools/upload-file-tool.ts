// Copy a file from the local upload directory to a path on an asset

import { readFile } from 'fs/promises';
import * as path from 'path';
import { TransportError, errorMessage } from '../../utils/errors.js';
import type { ToolDefinition, ToolExecutionResult } from './types.js';
import { resolveTarget, stringArg } from './target.js';

export interface UploadFileToolOptions {
  uploadDir: string;
}

export function createUploadFileTool(options: UploadFileToolOptions): ToolDefinition {
  const uploadRoot = path.resolve(options.uploadDir);

  return {
    name: 'upload_file',
    description: 'Upload a file that the user placed in the upload directory to a path on a configured asset.',
    parameters: [
      {
        name: 'asset_name',
        type: 'string',
        description: 'Name of the destination asset, exactly as returned by list_assets',
        required: true,
      },
      {
        name: 'local_path',
        type: 'string',
        description: 'File name relative to the upload directory',
        required: true,
      },
      {
        name: 'remote_path',
        type: 'string',
        description: 'Absolute destination path on the asset, including the file name',
        required: true,
      },
    ],

    async execute(args, context): Promise<ToolExecutionResult> {
      const localPath = stringArg(args, 'local_path');
      const remotePath = stringArg(args, 'remote_path');

      const resolvedLocal = path.resolve(uploadRoot, localPath);
      if (resolvedLocal !== uploadRoot && !resolvedLocal.startsWith(uploadRoot + path.sep)) {
        return { success: false, content: `local_path "${localPath}" is outside the upload directory` };
      }

      const target = await resolveTarget(stringArg(args, 'asset_name'), context);
      if (!target.ok) {
        return { success: false, content: target.error };
      }

      let content: Buffer;
      try {
        content = await readFile(resolvedLocal);
      } catch (error) {
        return { success: false, content: `Cannot read local file "${localPath}": ${errorMessage(error)}` };
      }

      const { asset } = target;
      const command = `upload ${localPath} -> ${remotePath}`;
      context.observer.commandStarted(asset.name, command);

      let result: string;
      let success = true;
      try {
        await context.executor.push(asset, content, remotePath);
        result = `Uploaded ${content.length} bytes to ${asset.name}:${remotePath}`;
      } catch (error) {
        success = false;
        result = error instanceof TransportError
          ? `SSH error: ${error.message}`
          : `Upload failed: ${errorMessage(error)}`;
        context.logger.warn({ asset: asset.name, remotePath, err: errorMessage(error) }, 'Upload failed');
      }

      context.observer.commandFinished({
        assetName: asset.name,
        command,
        result,
        timestamp: new Date().toISOString(),
      });

      return { success, content: result, metadata: { assetName: asset.name } };
    },
  };
}
