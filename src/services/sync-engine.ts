import { DateTime } from 'luxon';
import {
  CloudTransport,
  CommandField,
  CommandHandle,
  CommandListener,
  ControlValues,
  Device,
  DeviceState,
  StateListener
} from '../types';
import { EngineConfig, EngineConfigInput, resolveEngineConfig } from '../config/engine-config';
import { SessionManager, AuthFailureListener } from './session-manager';
import { CloudClient } from './cloud-client';
import { StateStore } from './state-store';
import { Poller, PollResult } from './poller';
import { CommandDispatcher } from './command-dispatcher';
import { FairlandTransport } from './fairland-transport';
import { Logger, createFallbackLogger } from '../util/logger';
import { DeviceNotFoundError, EngineStoppedError } from '../util/error-handler';

export interface EngineDependencies {
  /** Defaults to the Fairland cloud transport */
  transport?: CloudTransport;
  logger?: Logger;
}

export interface EngineStatus {
  running: boolean;
  stopped: boolean;
  authenticated: boolean;
  devices: number;
  unavailableDevices: number;
  pendingCommands: number;
  pollCycles: number;
  lastPollAt: string | null;
  lastSuccessfulPollAt: string | null;
  lastError: string | null;
}

function toIso(epochMs: number | null): string | null {
  return epochMs === null ? null : DateTime.fromMillis(epochMs).toUTC().toISO();
}

/**
 * Heat pump synchronization engine
 *
 * Entry point for a host application: wires the session manager, cloud
 * client, state store, poller and command dispatcher for one account.
 */
export class HeatPumpSyncEngine {
  readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly sessions: SessionManager;
  private readonly client: CloudClient;
  private readonly store: StateStore;
  private readonly poller: Poller;
  private readonly dispatcher: CommandDispatcher;
  private started = false;
  private stopped = false;

  constructor(config: EngineConfigInput, dependencies: EngineDependencies = {}) {
    this.config = resolveEngineConfig(config);
    this.logger = dependencies.logger ?? createFallbackLogger('HeatPumpSync');

    const transport = dependencies.transport ?? new FairlandTransport(this.config, this.logger);
    this.sessions = new SessionManager(transport, this.config.credential, this.logger, {
      safetyMarginMs: this.config.sessionSafetyMarginMs
    });
    this.client = new CloudClient(transport, this.sessions, this.logger, {
      requestTimeoutMs: this.config.requestTimeoutMs
    });
    this.store = new StateStore(this.logger);
    this.poller = new Poller(this.client, this.store, this.logger, {
      pollIntervalMs: this.config.pollIntervalMs,
      discoveryEveryCycles: this.config.discoveryEveryCycles
    });
    this.dispatcher = new CommandDispatcher(this.store, this.client, this.logger, {
      maxCommandAttempts: this.config.maxCommandAttempts,
      retryBaseDelayMs: this.config.retryBaseDelayMs,
      retryMaxDelayMs: this.config.retryMaxDelayMs,
      commandTimeoutMs: this.config.commandTimeoutMs,
      onAccepted: () => this.poller.requestPoll(this.config.confirmationPollDelayMs)
    });
  }

  /**
   * Authenticate, run the first poll and keep polling
   * @throws AuthError when the credential is refused
   */
  async start(): Promise<PollResult> {
    this.assertRunning();
    if (this.started) {
      return this.poller.pollOnce();
    }

    await this.sessions.acquire();
    this.started = true;
    this.logger.log('Heat pump sync engine started');
    return this.poller.start();
  }

  /**
   * @throws DeviceNotFoundError for a device not discovered yet
   */
  getState(deviceId: string): DeviceState {
    const state = this.store.get(deviceId);
    if (!state) {
      throw new DeviceNotFoundError(deviceId);
    }
    return state;
  }

  getDevices(): Device[] {
    return this.store.getDevices();
  }

  /**
   * Request a change. The returned handle's `completion` resolves with the
   * terminal outcome and never rejects.
   * @throws UnsupportedOperationError, DeviceNotFoundError or EngineStoppedError
   */
  issueCommand<F extends CommandField>(deviceId: string, field: F, value: ControlValues[F]): CommandHandle {
    this.assertRunning();
    return this.dispatcher.issueCommand(deviceId, field, value);
  }

  /**
   * Listen for state changes of one device, or of every device with '*'
   * @returns Function that removes the listener
   */
  subscribe(deviceId: string, listener: StateListener): () => void {
    if (deviceId === '*') {
      return this.store.subscribe(listener);
    }
    return this.store.subscribe((state, kind) => {
      if (state.deviceId === deviceId) {
        listener(state, kind);
      }
    });
  }

  onCommandSettled(listener: CommandListener): () => void {
    return this.dispatcher.onCommandSettled(listener);
  }

  onAuthFailure(listener: AuthFailureListener): () => void {
    return this.sessions.onAuthFailure(listener);
  }

  /**
   * Poll now instead of waiting for the next tick
   */
  refresh(): Promise<PollResult> {
    this.assertRunning();
    return this.poller.pollOnce();
  }

  getStatus(): EngineStatus {
    const stats = this.poller.getStats();
    const devices = this.store.deviceIds();
    return {
      running: this.poller.isRunning(),
      stopped: this.stopped,
      authenticated: this.sessions.hasSession(),
      devices: devices.length,
      unavailableDevices: devices.filter(id => this.store.get(id)?.unavailable === true).length,
      pendingCommands: this.dispatcher.pendingCount(),
      pollCycles: stats.cycles,
      lastPollAt: toIso(stats.lastPollAt),
      lastSuccessfulPollAt: toIso(stats.lastSuccessAt),
      lastError: stats.lastError?.message ?? null
    };
  }

  /**
   * Stop polling and expire every pending command. A poll already running
   * is allowed to finish.
   */
  async shutdown(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.dispatcher.shutdown();
    await this.poller.stop();
    this.sessions.invalidate();
    this.logger.log('Heat pump sync engine shut down');
  }

  private assertRunning(): void {
    if (this.stopped) {
      throw new EngineStoppedError();
    }
  }
}
