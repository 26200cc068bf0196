import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { EventFeed, registerWebSocket } from './api/websocket.js';
import type { AppConfig } from './config.js';
import { AssetRegistry } from './domain/token/assetRegistry.js';
import { EventBus, eventBus } from './infra/eventBus.js';
import { EventLogger } from './infra/logger.js';
import { createDefaultState } from './infra/storage/defaultState.js';
import { StateStore } from './infra/storage/stateStore.js';
import { AssetService } from './services/assetService.js';
import { AuditTrail } from './services/auditTrail.js';
import { GovernanceService, governanceSettingsFrom } from './services/governanceService.js';
import { MerchantService } from './services/merchantService.js';
import type { Clock } from './utils/time.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  assets: AssetRegistry;
  governanceService: GovernanceService;
  merchantService: MerchantService;
  assetService: AssetService;
}

export interface BuildOptions {
  clock?: Clock;
  bus?: EventBus;
  /** Overrides config paths; null keeps state or log in memory. */
  stateFile?: string | null;
  logFile?: string | null;
}

export async function buildApp(config: AppConfig, options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  const bus = options.bus ?? eventBus;

  if (config.app.websocketEnabled) {
    // Register WebSocket plugin first so routes can use { websocket: true }.
    await app.register(fastifyWebSocket);
  }

  const assets = new AssetRegistry(config.assets);

  const stateStore = new StateStore({
    stateFilePath: options.stateFile === undefined ? config.paths.stateFile : options.stateFile,
    defaults: () => createDefaultState({
      assets: assets.list(),
      majorityPercentage: config.governance.majorityPercentage,
      genesis: config.assets.genesis,
    }),
    clock: options.clock,
    bus,
  });
  await stateStore.init();

  const logger = new EventLogger(options.logFile === undefined ? config.paths.logFile : options.logFile);
  await logger.init();

  const audit = new AuditTrail(logger);
  const settings = governanceSettingsFrom(config);
  const governanceService = new GovernanceService(stateStore, assets, settings, audit);
  const merchantService = new MerchantService(stateStore, assets, settings.ledger, audit);
  const assetService = new AssetService(stateStore, assets, config.ledger.treasuryAddress, audit);

  const feed = new EventFeed(bus);
  if (config.app.websocketEnabled) {
    await registerWebSocket(app, feed);
  }

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    store: stateStore,
    governanceService,
    merchantService,
    assetService,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      ...audit.counts(),
      websocketClients: feed.size,
    }),
  });

  return {
    app,
    stateStore,
    logger,
    assets,
    governanceService,
    merchantService,
    assetService,
  };
}
