/**
 * Vigil - entry point
 *
 * Starts the security core behind a discord.js client, the maintenance
 * schedule and the operator API.
 */

import { Client, GatewayIntentBits, Partials } from 'discord.js';
import { ENV } from './config/environment';
import { loadSecurityConfig } from './config/security.config';
import { ConfigurationError } from './domain/errors/SecurityErrors';
import { attachAuditLog, createProfileStore, createSecurityCore } from './kernel/KernelBootstrap';
import { DiscordAdapter } from './kernel/DiscordAdapter';
import { DiscordActionExecutor } from './systems/DiscordActionExecutor';
import { scheduleMaintenance } from './systems/SecurityMaintenance';
import { HttpThreatIntel } from './services/ThreatIntelService';
import { metricsService } from './services/MetricsService';
import { SecurityAPI } from './api/SecurityAPI';
import { closeConnections } from './database/config';
import { createLogger } from './services/Logger';

const logger = createLogger('Main');

async function main(): Promise<void> {
  logger.info('═'.repeat(60));
  logger.info('🚀 VIGIL - STARTING');
  logger.info('═'.repeat(60));

  // Fail fast on bad thresholds before touching the network
  const config = loadSecurityConfig(ENV.SECURITY_OVERRIDES);
  if (!ENV.DISCORD_TOKEN) {
    throw new ConfigurationError('Missing environment', ['DISCORD_TOKEN is required']);
  }

  const client = new Client({
    intents: [
      GatewayIntentBits.Guilds,
      GatewayIntentBits.GuildMessages,
      GatewayIntentBits.GuildMembers,
      GatewayIntentBits.MessageContent,
    ],
    partials: [Partials.Message],
  });

  const store = await createProfileStore(config);
  const threatIntel = ENV.THREAT_INTEL_URL
    ? new HttpThreatIntel(ENV.THREAT_INTEL_URL, config.threatIntelTimeoutMs)
    : undefined;

  const core = createSecurityCore({
    config,
    store,
    threatIntel,
    metrics: metricsService,
    executor: new DiscordActionExecutor(client, ENV.MOD_LOG_CHANNELS),
  });
  const detachAudit = attachAuditLog(core.events);

  const adapter = new DiscordAdapter(client, core.coordinator, core.reporter);
  adapter.initialize();

  const sweepTask = scheduleMaintenance(core.maintenance, ENV.SWEEP_CRON);

  const api = new SecurityAPI(core.coordinator, core.reporter, metricsService);
  if (ENV.API_PORT > 0) {
    await api.start(ENV.API_PORT);
  }

  client.once('ready', ready => {
    logger.info(`✅ Logged in as ${ready.user.tag} (${ready.guilds.cache.size} guilds)`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`🛑 ${signal} received, shutting down...`);

    sweepTask.stop();
    adapter.shutdown();
    await core.coordinator.drain();
    const { remaining } = await core.coordinator.reconcile();
    if (remaining > 0) {
      logger.warn(`${remaining} profile(s) could not be saved before exit`);
    }
    detachAudit();
    await api.stop();
    await client.destroy();
    await closeConnections();
    logger.info('👋 Shutdown complete');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal)
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Shutdown failed', error);
          process.exit(1);
        });
    });
  }

  await client.login(ENV.DISCORD_TOKEN);
}

main().catch(error => {
  logger.error('❌ Fatal startup error', error);
  process.exit(1);
});
