export { Daemon, type DaemonOptions } from './services/daemon.js';
export { CommandStore, type CommandStoreOptions, type RecordFilterOptions } from './services/command-store.js';
export { VectorIndex, type VectorIndexOptions, type IndexItem } from './services/vector-index.js';
export {
  NgramHashEmbedder,
  GuardedEmbedder,
  type Embedder,
  type GuardedEmbedderOptions,
} from './services/embedder.js';
export { SuggestionCascade, mergeCandidates, compareCandidates } from './services/suggestion-cascade.js';
export { PrivacyPolicy } from './services/privacy-policy.js';
export { ConfigProvider } from './services/config-provider.js';
export { IndexCoordinator } from './services/index-coordinator.js';
export { RetentionScheduler } from './services/retention-scheduler.js';
export { IpcServer, type FrameHandler } from './services/ipc/ipc-server.js';
export { IpcClient, sendRequest } from './services/ipc/ipc-client.js';
export { RequestRouter, type CommandExplainer } from './services/ipc/request-router.js';
export { FrameDecoder, encodeFrame } from './services/ipc/frame-codec.js';
export { tokenSortRatio, ratio } from './lib/fuzzy.js';
export { Logger, createSilentLogger } from './lib/logger.js';
export { ConfigurationManager, createConfigManager, type DaemonPaths } from './lib/env-config.js';
export * from './lib/errors/DaemonErrors.js';
export * from './models/command-record.js';
export * from './models/suggestion.js';
export * from './models/vector-entry.js';
export * from './models/daemon-config.js';
export * from './models/ipc-message.js';
