export * from './types';
export * from './util/error-handler';
export { ConsoleLogger, LogCategory, LogLevel, createFallbackLogger } from './util/logger';
export type { Logger, LoggerConfig } from './util/logger';
export { resolveEngineConfig } from './config/engine-config';
export type { EngineConfig, EngineConfigInput } from './config/engine-config';
export { SettingsLoader, createEnvSettingsSource } from './services/settings-loader';
export type { SettingsSource } from './services/settings-loader';
export { SessionManager } from './services/session-manager';
export type { AuthFailureListener } from './services/session-manager';
export { CloudClient } from './services/cloud-client';
export { StateStore } from './services/state-store';
export { Poller } from './services/poller';
export type { PollResult } from './services/poller';
export { CommandDispatcher, validateCommand } from './services/command-dispatcher';
export { FairlandTransport } from './services/fairland-transport';
export { HeatPumpSyncEngine } from './services/sync-engine';
export type { EngineDependencies, EngineStatus } from './services/sync-engine';
