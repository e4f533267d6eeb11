/**
 * Request Router
 *
 * Maps validated IPC requests onto the store, the suggestion cascade and the
 * configuration provider. Every failure is answered with an error response;
 * nothing thrown by a handler escapes the router.
 */

import type { CommandStore } from '../command-store.js';
import type { SuggestionCascade } from '../suggestion-cascade.js';
import type { ConfigProvider } from '../config-provider.js';
import type { PrivacyPolicy } from '../privacy-policy.js';
import type { VectorIndex } from '../vector-index.js';
import type { IndexCoordinator } from '../index-coordinator.js';
import type { GuardedEmbedder } from '../embedder.js';
import type { Logger } from '../../lib/logger.js';
import { createSilentLogger } from '../../lib/logger.js';
import {
  DaemonError,
  ProtocolError,
  RetrievalFailedError,
  UnavailableError,
  toError,
} from '../../lib/errors/DaemonErrors.js';
import {
  errorResponse,
  okResponse,
  parseRequest,
  type HistoryData,
  type IpcRequest,
  type IpcResponse,
  type LogCommandData,
  type SuggestData,
} from '../../models/ipc-message.js';

/**
 * Produces a human-readable explanation of a command line
 */
export interface CommandExplainer {
  explain(command: string): Promise<string>;
}

export interface RequestRouterDependencies {
  store: CommandStore;
  cascade: SuggestionCascade;
  config: ConfigProvider;
  privacy: PrivacyPolicy;
  index: VectorIndex;
  coordinator?: IndexCoordinator | null;
  embedder?: GuardedEmbedder | null;
  explainer?: CommandExplainer | null;
  /** Invoked once a shutdown request has been answered */
  onShutdown?: () => void;
  logger?: Logger;
  now?: () => number;
}

export interface RouterStats {
  startedAt: number;
  requestsHandled: number;
  commandsLogged: number;
  commandsFiltered: number;
  suggestionsGenerated: number;
  errors: number;
}

export class RequestRouter {
  private deps: RequestRouterDependencies;
  private logger: Logger;
  private now: () => number;
  private stats: RouterStats;

  constructor(deps: RequestRouterDependencies) {
    this.deps = deps;
    this.logger = deps.logger ?? createSilentLogger();
    this.now = deps.now ?? Date.now;
    this.stats = {
      startedAt: this.now(),
      requestsHandled: 0,
      commandsLogged: 0,
      commandsFiltered: 0,
      suggestionsGenerated: 0,
      errors: 0,
    };
  }

  /**
   * Parse and answer one frame
   */
  async handleFrame(frame: string): Promise<IpcResponse> {
    const parsed = parseRequest(frame);
    if (parsed.isErr()) {
      this.stats.errors++;
      this.logger.debug('Rejected request', { error: parsed.error.message });
      return errorResponse(parsed.error);
    }
    return this.dispatch(parsed.value);
  }

  /**
   * Answer a validated request
   */
  async dispatch(request: IpcRequest): Promise<IpcResponse> {
    this.stats.requestsHandled++;
    try {
      const response = await this.route(request);
      if (response.status === 'error') {
        this.stats.errors++;
      }
      return response;
    } catch (error) {
      this.stats.errors++;
      const cause = toError(error);
      this.logger.error('Request handler failed', { type: request.type, error: cause.message });
      return errorResponse(
        cause instanceof DaemonError ? cause : new RetrievalFailedError(cause.message, cause)
      );
    }
  }

  getStats(): RouterStats {
    return { ...this.stats };
  }

  uptimeSeconds(): number {
    return (this.now() - this.stats.startedAt) / 1000;
  }

  private async route(request: IpcRequest): Promise<IpcResponse> {
    switch (request.type) {
      case 'ping':
        return okResponse({ message: 'pong' });
      case 'log_command':
        return this.handleLogCommand(request.data);
      case 'suggest':
      case 'complete':
        return this.handleSuggest(request.data);
      case 'get_history':
        return this.handleHistory(request.data, false);
      case 'search':
        return this.handleHistory(request.data, true);
      case 'get_analytics':
        return this.handleAnalytics();
      case 'get_config':
        return this.handleGetConfig(request.data.key);
      case 'set_config':
        return this.handleSetConfig(request.data.key, request.data.value);
      case 'explain_command':
        return this.handleExplain(request.data.command);
      case 'status':
        return this.handleStatus();
      case 'shutdown':
        return this.handleShutdown();
    }
  }

  private async handleLogCommand(data: LogCommandData): Promise<IpcResponse> {
    if (this.deps.privacy.shouldFilter(data.command, data.cwd)) {
      this.stats.commandsFiltered++;
      return okResponse({ filtered: true });
    }

    const logged = await this.deps.store.log({
      command: data.command,
      cwd: data.cwd,
      exitCode: data.exit_code,
      durationSeconds: data.duration ?? 0,
      timestamp: data.timestamp,
      sessionId: data.session_id,
    });
    if (logged.isErr()) {
      return errorResponse(logged.error);
    }

    this.stats.commandsLogged++;
    this.deps.coordinator?.enqueue({ id: logged.value, command: data.command, exitCode: data.exit_code });
    return okResponse({ id: logged.value });
  }

  private async handleSuggest(data: SuggestData): Promise<IpcResponse> {
    const result = await this.deps.cascade.suggest({
      partial: data.partial,
      cwd: data.cwd,
      history: data.history,
    });
    if (result.isErr()) {
      return errorResponse(result.error);
    }

    this.stats.suggestionsGenerated += result.value.length;
    return okResponse({
      suggestions: result.value.map((candidate) => ({
        command: candidate.command,
        confidence: candidate.confidence,
        source_tier: candidate.source_tier,
        tiers: candidate.tiers,
      })),
    });
  }

  /**
   * Recent records, or full-text matches when a query is given
   */
  private handleHistory(data: HistoryData, requireQuery: boolean): IpcResponse {
    const query = (data.search ?? data.query ?? '').trim();
    if (query.length === 0 && requireQuery) {
      return errorResponse(new ProtocolError('Invalid payload for search: query is required', 'search'));
    }

    const records =
      query.length > 0
        ? this.deps.store.searchText(query, data.limit)
        : this.deps.store.recent(data.limit, data.cwd);
    if (records.isErr()) {
      return errorResponse(records.error);
    }
    return okResponse({ history: records.value });
  }

  private handleAnalytics(): IpcResponse {
    const statistics = this.deps.store.getStatistics();
    if (statistics.isErr()) {
      return errorResponse(statistics.error);
    }
    return okResponse({
      analytics: {
        ...statistics.value,
        index: this.deps.index.getStatistics(),
      },
    });
  }

  private handleGetConfig(key: string | undefined): IpcResponse {
    if (key === undefined) {
      return okResponse({ config: this.deps.config.getConfig() });
    }
    const value = this.deps.config.get(key);
    if (value.isErr()) {
      return errorResponse(value.error);
    }
    return okResponse({ key, value: value.value });
  }

  private handleSetConfig(key: string, value: unknown): IpcResponse {
    const updated = this.deps.config.set(key, value);
    if (updated.isErr()) {
      return errorResponse(updated.error);
    }
    return okResponse({ success: true, key, value });
  }

  private async handleExplain(command: string): Promise<IpcResponse> {
    const explainer = this.deps.explainer;
    if (!explainer) {
      return errorResponse(new UnavailableError('explain_command'));
    }
    const explanation = await explainer.explain(command);
    return okResponse({ explanation });
  }

  private handleStatus(): IpcResponse {
    return okResponse({
      state: 'running',
      pid: process.pid,
      uptime_seconds: this.uptimeSeconds(),
      requests_handled: this.stats.requestsHandled,
      commands_logged: this.stats.commandsLogged,
      commands_filtered: this.stats.commandsFiltered,
      suggestions_generated: this.stats.suggestionsGenerated,
      index: this.deps.index.getStatistics(),
      indexing: this.deps.coordinator?.getStats() ?? null,
      embedder: this.deps.embedder?.getStats() ?? null,
    });
  }

  private handleShutdown(): IpcResponse {
    this.logger.info('Shutdown requested via IPC');
    const onShutdown = this.deps.onShutdown;
    if (onShutdown) {
      setImmediate(onShutdown);
    }
    return okResponse({ message: 'shutting_down' });
  }
}
