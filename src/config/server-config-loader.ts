// src/config/server-config-loader.ts

import * as fs from 'fs/promises';
import * as path from 'path';
import type { ServerConfigMetadata } from './schema.js';
import { ServerConfigNotFoundError, ServerConfigParseError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export const DEFAULT_CONFIG_FILE = 'server.json';

export interface ServerConfigLoadResult {
  document: unknown;
  metadata: ServerConfigMetadata;
}

export class ServerConfigLoader {
  constructor(private repoPath: string) {}

  async load(fileName: string = DEFAULT_CONFIG_FILE): Promise<ServerConfigLoadResult> {
    const sourcePath = path.isAbsolute(fileName)
      ? fileName
      : path.join(this.repoPath, fileName);

    Logger.debug(`Reading ${sourcePath}`);

    let content: string;
    try {
      content = await fs.readFile(sourcePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        throw new ServerConfigNotFoundError(fileName);
      }
      throw error;
    }

    const document = this.parse(content, fileName);

    return {
      document,
      metadata: {
        sourcePath,
        loadedAt: new Date().toISOString(),
      },
    };
  }

  private parse(content: string, fileName: string): unknown {
    try {
      const document: unknown = JSON.parse(content);
      return document;
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new ServerConfigParseError(fileName, detail);
    }
  }
}
