// src/cli/commands/validate.ts

import * as path from 'path';
import {
  DEFAULT_CONFIG_FILE,
  type ServerConfigLoadResult,
  ServerConfigLoader,
} from '../../config/server-config-loader.js';
import { validateServerConfig } from '../../validators/validation-orchestrator.js';
import { ReportFormatter } from '../../utils/report-formatter.js';
import { ServerConfigError } from '../../utils/errors.js';
import { Logger } from '../../utils/logger.js';

export async function validateServerCommand(
  repoPath: string,
  fileName: string = DEFAULT_CONFIG_FILE
): Promise<void> {
  const loaded = await loadDocument(repoPath, fileName);
  if (!loaded) {
    process.exit(1);
  }

  const fileLabel = path.basename(fileName);
  console.log(`Validating ${fileLabel}...\n`);

  const result = validateServerConfig(loaded.document);
  Logger.debug(
    `${loaded.metadata.sourcePath}: ${result.errors.length} error(s), ${result.warnings.length} warning(s)`
  );

  console.log(ReportFormatter.formatResults(result, fileLabel));
  console.log(ReportFormatter.formatSummary(loaded.document));

  process.exit(ReportFormatter.getExitCode(result));
}

async function loadDocument(
  repoPath: string,
  fileName: string
): Promise<ServerConfigLoadResult | undefined> {
  try {
    return await new ServerConfigLoader(repoPath).load(fileName);
  } catch (error) {
    if (error instanceof ServerConfigError) {
      Logger.error(error.message);
    } else {
      Logger.error(`Failed to read ${fileName}: ${error instanceof Error ? error.message : String(error)}`);
    }
    return undefined;
  }
}
