/**
 * Daemon
 *
 * Wires the command store, vector index, suggestion cascade and IPC server
 * into one long-running process.
 *
 * Startup: PID marker, socket, accept loop; the index is bootstrapped in the
 * background once the socket is accepting. Shutdown (SIGTERM, SIGINT or a
 * `shutdown` request): stop accepting, drain in-flight requests within the
 * grace period, save the index, close the store, remove the PID marker.
 */

import type { DaemonPaths } from '../lib/env-config.js';
import { Logger, createSilentLogger } from '../lib/logger.js';
import { BindConflictError, toError } from '../lib/errors/DaemonErrors.js';
import { ConfigProvider } from './config-provider.js';
import { CommandStore } from './command-store.js';
import { VectorIndex } from './vector-index.js';
import { GuardedEmbedder, NgramHashEmbedder, type Embedder } from './embedder.js';
import { SuggestionCascade } from './suggestion-cascade.js';
import { PrivacyPolicy } from './privacy-policy.js';
import { IndexCoordinator } from './index-coordinator.js';
import { RetentionScheduler } from './retention-scheduler.js';
import { PidMarker } from './pid-marker.js';
import { IpcServer, isSocketLive } from './ipc/ipc-server.js';
import { RequestRouter, type CommandExplainer } from './ipc/request-router.js';

export interface DaemonOptions {
  paths: DaemonPaths;
  logger?: Logger;
  /** Applied over config.json */
  configOverrides?: unknown;
  /** Replaces the built-in n-gram embedder */
  embedder?: Embedder;
  explainer?: CommandExplainer | null;
  migrationsDir?: string;
  /** Install SIGTERM/SIGINT handlers (default: true) */
  handleSignals?: boolean;
  /** Start the periodic retention pass (default: true) */
  retention?: boolean;
}

interface Components {
  store: CommandStore;
  index: VectorIndex;
  guarded: GuardedEmbedder;
  coordinator: IndexCoordinator;
  retention: RetentionScheduler;
  server: IpcServer;
  router: RequestRouter;
}

export class Daemon {
  private options: DaemonOptions;
  private paths: DaemonPaths;
  private logger: Logger;
  private config: ConfigProvider;
  private pidMarker: PidMarker;
  private components: Components | null = null;
  private bootstrapping: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;
  private exited: Promise<void>;
  private resolveExited: () => void = () => undefined;
  private signalHandler = (signal: NodeJS.Signals): void => {
    this.logger.info('Received signal', { signal });
    this.requestStop();
  };

  constructor(options: DaemonOptions) {
    this.options = options;
    this.paths = options.paths;
    this.logger = options.logger ?? createSilentLogger();
    this.config = new ConfigProvider(this.paths.configPath, {
      logger: this.logger,
      overrides: options.configOverrides,
    });
    this.pidMarker = new PidMarker(this.paths.pidPath);
    this.exited = new Promise((resolve) => {
      this.resolveExited = resolve;
    });
  }

  /**
   * Open the store and start serving
   *
   * @throws BindConflictError when another daemon owns the socket
   * @throws StoreError when the database cannot be opened
   */
  async start(): Promise<void> {
    if (this.components) {
      return;
    }

    if (await isSocketLive(this.paths.socketPath)) {
      throw new BindConflictError(this.paths.socketPath);
    }

    const config = this.config.getConfig();
    const opened = CommandStore.open({
      dbPath: this.paths.dbPath,
      logger: this.logger,
      migrationsDir: this.options.migrationsDir,
    });
    if (opened.isErr()) {
      throw opened.error;
    }
    const store = opened.value;

    const embedder = this.options.embedder ?? new NgramHashEmbedder(config.index.dim);
    const guarded = new GuardedEmbedder(embedder, { logger: this.logger });
    const index = new VectorIndex({
      dim: embedder.dimension,
      nTrees: config.index.n_trees,
      directory: this.paths.indexDir,
      logger: this.logger,
    });
    const coordinator = new IndexCoordinator({
      store,
      index,
      embedder,
      batchSize: config.index.batch_size,
      flushIntervalMs: config.index.flush_interval_ms,
      logger: this.logger,
    });
    const cascade = new SuggestionCascade({
      store,
      index,
      embedder: guarded,
      settings: () => this.config.getConfig().suggestions,
      logger: this.logger,
    });
    const privacy = new PrivacyPolicy(config.privacy, { logger: this.logger });
    const retention = new RetentionScheduler({
      store,
      index: coordinator,
      retentionDays: () => this.config.getConfig().privacy.retention_days,
      logger: this.logger,
    });
    const router = new RequestRouter({
      store,
      cascade,
      config: this.config,
      privacy,
      index,
      coordinator,
      embedder: guarded,
      explainer: this.options.explainer,
      onShutdown: () => this.requestStop(),
      logger: this.logger,
    });
    const server = new IpcServer({
      socketPath: this.paths.socketPath,
      handler: router,
      requestTimeoutMs: () => this.config.getConfig().daemon.request_timeout_ms,
      idleTimeoutMs: config.daemon.idle_timeout_ms,
      logger: this.logger,
    });

    this.config.onConfigChange((next, key) => {
      if (key.startsWith('privacy.')) {
        privacy.update(next.privacy);
      } else if (key.startsWith('index.')) {
        this.logger.info('Index settings take effect after a restart', { key });
      }
    });

    this.pidMarker.write();
    try {
      await server.start();
    } catch (error) {
      this.pidMarker.remove();
      guarded.shutdown();
      await store.close();
      throw error;
    }

    this.components = { store, index, guarded, coordinator, retention, server, router };
    const retentionEnabled = this.options.retention ?? true;
    this.bootstrapping = coordinator
      .bootstrap()
      .catch((error: unknown) => {
        this.logger.error('Index bootstrap failed', { error: toError(error).message });
      })
      .then(() => {
        // Retention passes rebuild the index, so they start after the saved one is loaded
        if (retentionEnabled && this.isRunning()) {
          retention.start();
        }
      });
    if (this.options.handleSignals ?? true) {
      process.once('SIGTERM', this.signalHandler);
      process.once('SIGINT', this.signalHandler);
    }

    this.logger.info('Daemon started', {
      pid: process.pid,
      socketPath: this.paths.socketPath,
      dataDir: this.paths.dataDir,
    });
  }

  /**
   * Graceful shutdown; repeated calls share one run
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.shutdown();
    }
    return this.stopping;
  }

  /**
   * Resolves once the daemon has stopped
   */
  waitForExit(): Promise<void> {
    return this.exited;
  }

  isRunning(): boolean {
    return this.components !== null && this.stopping === null;
  }

  /**
   * Finished once the startup index bootstrap completes
   */
  whenIndexReady(): Promise<void> {
    return this.bootstrapping ?? Promise.resolve();
  }

  getPaths(): DaemonPaths {
    return this.paths;
  }

  getConfigProvider(): ConfigProvider {
    return this.config;
  }

  private requestStop(): void {
    this.stop().catch((error: unknown) => {
      this.logger.error('Shutdown failed', { error: toError(error).message });
    });
  }

  private async shutdown(): Promise<void> {
    process.off('SIGTERM', this.signalHandler);
    process.off('SIGINT', this.signalHandler);

    const components = this.components;
    if (!components) {
      this.resolveExited();
      return;
    }

    this.logger.info('Shutting down daemon');
    try {
      components.retention.stop();
      await components.server.stop(this.config.getConfig().daemon.shutdown_grace_ms);
      await this.bootstrapping;
      await components.coordinator.shutdown();
      components.guarded.shutdown();
      await components.store.close();
    } finally {
      this.pidMarker.remove();
      this.components = null;
      this.logger.info('Daemon stopped', { requests: components.router.getStats().requestsHandled });
      this.resolveExited();
    }
  }
}
