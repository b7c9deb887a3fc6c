// src/config/requiredParams.ts

import fs from 'fs';
import type { RequestParams } from '../core/transport/types';
import type { Logger } from '../observability/Logger';
import { ConfigError, errorMessage } from '../utils/errors';
import { RequiredParamsSchema } from './ConfigValidator';

/**
 * Read a JSON file of `{ "<endpoint>": { "<param>": value } }`.
 */
export async function loadRequiredParamsFile(filePath: string): Promise<Record<string, RequestParams>> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new ConfigError(`Cannot read required params file ${filePath}: ${errorMessage(error)}`, {
      filePath,
    });
  }

  const parsed = RequiredParamsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid required params file ${filePath}`, {
      filePath,
      errors: parsed.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
    });
  }

  return parsed.data;
}

/**
 * Later sources win per endpoint: profile defaults, then the file, then explicit params.
 */
export function mergeRequiredParams(
  logger: Logger,
  ...sources: Array<Record<string, RequestParams> | undefined>
): Map<string, RequestParams> {
  const merged = new Map<string, RequestParams>();

  for (const source of sources) {
    if (!source) continue;
    for (const [endpoint, params] of Object.entries(source)) {
      merged.set(endpoint, { ...params });
    }
  }

  logger.debug('Required params loaded', { endpoints: Array.from(merged.keys()) });
  return merged;
}
