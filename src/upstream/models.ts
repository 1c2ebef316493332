import type { Logger } from 'pino';
import type { UpstreamClient } from './client.js';

export interface ProvisionResult {
  present: string[];
  pulled: string[];
  failed: Array<{ model: string; error: string }>;
}

/**
 * Pull every allowed model the upstream does not have yet.
 * Best effort: failures are logged and reported, never thrown.
 */
export async function ensureModelsAvailable(
  client: Pick<UpstreamClient, 'listModels' | 'pullModel'>,
  models: readonly string[],
  logger: Logger
): Promise<ProvisionResult> {
  const result: ProvisionResult = { present: [], pulled: [], failed: [] };

  let existing: string[];
  try {
    existing = await client.listModels();
  } catch (err) {
    logger.warn({ err }, 'Could not list upstream models, skipping model provisioning');
    result.failed = models.map((model) => ({ model, error: 'list_failed' }));
    return result;
  }

  for (const model of models) {
    if (existing.includes(model)) {
      logger.info({ model }, 'Model already present');
      result.present.push(model);
      continue;
    }

    logger.info({ model }, 'Pulling model');
    try {
      await client.pullModel(model);
      logger.info({ model }, 'Model pulled');
      result.pulled.push(model);
    } catch (err) {
      logger.warn({ err, model }, 'Could not pull model');
      result.failed.push({ model, error: err instanceof Error ? err.message : String(err) });
    }
  }

  return result;
}
