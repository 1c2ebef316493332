import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { Config } from './config/index.js';
import { CredentialStore } from './credentials/index.js';
import { AuthGuard } from './auth/index.js';
import { UpstreamClient } from './upstream/client.js';
import { ensureReachable, type Sleep } from './upstream/retry.js';
import { ensureModelsAvailable, type ProvisionResult } from './upstream/models.js';
import type { UpstreamHealth } from './upstream/types.js';
import { createGatewayServer } from './proxy/server.js';

export interface StartGatewayOptions {
  /** Pause between warm-up attempts; real timers when omitted */
  sleep?: Sleep;
}

export interface RunningGateway {
  server: FastifyInstance;
  /** Outcome of the startup warm-up */
  health: UpstreamHealth;
  /**
   * Model provisioning started after listen. Resolves to undefined when it was
   * skipped; never rejects.
   */
  provisioning: Promise<ProvisionResult | undefined>;
}

/**
 * Startup sequence: credentials, warm-up, listen, then model provisioning in the
 * background. Startup is delayed by the warm-up only, never by a model download.
 */
export async function startGateway(
  config: Readonly<Config>,
  logger: Logger,
  options: StartGatewayOptions = {}
): Promise<RunningGateway> {
  const credentials = CredentialStore.fromConfig(config.auth.api_keys, logger);
  const authGuard = new AuthGuard(credentials, logger.child({ component: 'auth' }));

  const upstream = new UpstreamClient(config.upstream.url, {
    probeTimeoutMs: config.upstream.probe_timeout_ms,
    requestTimeoutMs: config.upstream.request_timeout_ms,
    pullTimeoutMs: config.upstream.pull_timeout_ms,
  });

  // Best-effort warm-up: the gateway starts even when the upstream stays down
  logger.info(
    {
      upstream: config.upstream.url,
      maxAttempts: config.startup.max_attempts,
      retryDelayMs: config.startup.retry_delay_ms,
    },
    'Checking upstream availability'
  );
  const health = await ensureReachable({
    probe: () => upstream.check(),
    maxAttempts: config.startup.max_attempts,
    delayMs: config.startup.retry_delay_ms,
    sleep: options.sleep,
    logger,
  });

  if (!health.reachable) {
    logger.warn(
      { detail: health.detail },
      'Serving without a reachable upstream; /health/ollama reports its state'
    );
  }

  const server = await createGatewayServer({ config, authGuard, upstream, logger });

  const { listen_host: host, listen_port: port } = config.gateway;
  await server.listen({ port, host });
  logger.info({ host, port, upstream: config.upstream.url }, 'Gateway started');

  const provisioning =
    health.reachable && config.upstream.pull_models
      ? ensureModelsAvailable(upstream, config.models.allowed, logger)
      : Promise.resolve(undefined);

  return { server, health, provisioning };
}
