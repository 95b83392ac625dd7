import { StateStore } from './state-store';
import { CloudClient } from './cloud-client';
import { Logger } from '../util/logger';
import {
  AppError,
  AuthError,
  DeviceUnavailableError,
  ErrorHandler,
  isRetryableTransportError
} from '../util/error-handler';

export interface PollerOptions {
  pollIntervalMs: number;
  /** Re-run discovery every this many cycles */
  discoveryEveryCycles: number;
}

export interface PollResult {
  cycle: number;
  devices: number;
  updated: string[];
  unavailable: string[];
  skipped: string[];
  /** One entry per device marked unavailable this cycle */
  deviceErrors: DeviceUnavailableError[];
  error: AppError | null;
}

/**
 * Poller
 *
 * Fetches authoritative state on a fixed interval. Cycles never overlap: the
 * next one is scheduled when the previous one finishes. A retryable failure
 * skips the tick; a fatal one marks the affected devices unavailable.
 */
export class Poller {
  private timer: NodeJS.Timeout | null = null;
  private nextDueAt: number | null = null;
  private inFlight: Promise<PollResult> | null = null;
  private expediteAfterCycle: number | null = null;
  private stopped = true;
  private cycle = 0;
  private cyclesSinceDiscovery = 0;
  private needsDiscovery = true;
  private lastPollAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private lastError: AppError | null = null;
  private readonly errorHandler: ErrorHandler;

  constructor(
    private readonly client: Pick<CloudClient, 'listDevices' | 'getStates'>,
    private readonly store: StateStore,
    private readonly logger: Logger,
    private readonly options: PollerOptions
  ) {
    this.errorHandler = new ErrorHandler(logger);
  }

  /**
   * Poll immediately, then on every interval
   * @returns The first cycle's result
   */
  start(): Promise<PollResult> {
    if (!this.stopped) {
      return this.pollOnce();
    }
    this.stopped = false;
    this.logger.log(`Polling started, interval ${this.options.pollIntervalMs}ms`);
    return this.runScheduled();
  }

  /**
   * Stop scheduling. A cycle already running is allowed to finish.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.clearTimer();
    this.expediteAfterCycle = null;
    if (this.inFlight) {
      await this.inFlight;
    }
    this.logger.log('Polling stopped');
  }

  isRunning(): boolean {
    return !this.stopped;
  }

  /**
   * Run one cycle now. Callers arriving during a cycle share its result.
   */
  pollOnce(): Promise<PollResult> {
    if (this.inFlight) {
      return this.inFlight;
    }
    this.inFlight = this.runCycle().finally(() => {
      this.inFlight = null;
      const expedite = this.expediteAfterCycle;
      this.expediteAfterCycle = null;
      if (expedite !== null) {
        this.requestPoll(expedite);
      }
    });
    return this.inFlight;
  }

  /**
   * Bring the next cycle forward to at most `delayMs` from now
   */
  requestPoll(delayMs: number): void {
    if (this.stopped) return;

    if (this.inFlight) {
      // The running cycle may predate the caller's interest; run another after it
      this.expediteAfterCycle = Math.min(this.expediteAfterCycle ?? delayMs, delayMs);
      return;
    }

    if (this.nextDueAt === null || this.nextDueAt > Date.now() + delayMs) {
      this.logger.debug(`Expedited poll in ${delayMs}ms`);
      this.schedule(delayMs);
    }
  }

  getStats(): { cycles: number; lastPollAt: number | null; lastSuccessAt: number | null; lastError: AppError | null } {
    return {
      cycles: this.cycle,
      lastPollAt: this.lastPollAt,
      lastSuccessAt: this.lastSuccessAt,
      lastError: this.lastError
    };
  }

  private runScheduled(): Promise<PollResult> {
    this.clearTimer();
    return this.pollOnce().then(result => {
      this.afterCycle();
      return result;
    });
  }

  private afterCycle(): void {
    if (this.stopped) return;
    // Keep an expedited cycle that is already due sooner than the regular one
    if (this.nextDueAt !== null && this.nextDueAt <= Date.now() + this.options.pollIntervalMs) return;
    this.schedule(this.options.pollIntervalMs);
  }

  private schedule(delayMs: number): void {
    this.clearTimer();
    this.nextDueAt = Date.now() + delayMs;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.nextDueAt = null;
      this.runScheduled().catch(error => {
        this.errorHandler.logError(error, { operation: 'scheduledPoll' });
      });
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextDueAt = null;
  }

  private async runCycle(): Promise<PollResult> {
    this.cycle++;
    this.lastPollAt = Date.now();
    const result: PollResult = { cycle: this.cycle, devices: 0, updated: [], unavailable: [], skipped: [], deviceErrors: [], error: null };

    try {
      if (this.needsDiscovery || this.cyclesSinceDiscovery >= this.options.discoveryEveryCycles) {
        if (this.stopped) return result;
        await this.discover();
      }
      this.cyclesSinceDiscovery++;

      const deviceIds = this.store.deviceIds();
      result.devices = deviceIds.length;
      if (deviceIds.length === 0 || this.stopped) {
        return result;
      }

      // Stamp before the request: only data fetched after a command's acceptance may corroborate it
      const observedAt = Date.now();
      const states = await this.client.getStates(deviceIds);

      for (const deviceId of deviceIds) {
        const fetched = states[deviceId];
        if (!fetched) {
          this.logger.debug(`No state returned for device ${deviceId}`);
          result.skipped.push(deviceId);
        } else if (fetched.ok) {
          this.store.applyConfirmed(deviceId, fetched.snapshot, observedAt);
          result.updated.push(deviceId);
        } else if (fetched.error.retryable) {
          this.logger.warn(`Transient failure polling device ${deviceId}, keeping last state`, { error: fetched.error.message });
          result.skipped.push(deviceId);
        } else {
          this.markUnavailable(result, deviceId, fetched.error);
        }
      }

      this.lastSuccessAt = Date.now();
      this.lastError = null;
      this.logger.debug(`Poll cycle ${result.cycle}: ${result.updated.length} updated, ${result.unavailable.length} unavailable, ${result.skipped.length} skipped`);
      return result;
    } catch (error) {
      const appError = this.errorHandler.createAppError(error, { operation: 'poll', cycle: result.cycle });
      result.error = appError;
      this.lastError = appError;

      if (isRetryableTransportError(appError)) {
        this.logger.warn(`Poll cycle ${result.cycle} skipped: ${appError.message}`);
        return result;
      }

      if (!(appError instanceof AuthError)) {
        this.errorHandler.logError(appError);
      }
      for (const deviceId of this.store.deviceIds()) {
        this.markUnavailable(result, deviceId, appError);
      }
      return result;
    }
  }

  private markUnavailable(result: PollResult, deviceId: string, cause: AppError): void {
    this.store.markUnavailable(deviceId, cause.message);
    result.unavailable.push(deviceId);
    result.deviceErrors.push(new DeviceUnavailableError(deviceId, cause.message, cause));
  }

  private async discover(): Promise<void> {
    const devices = await this.client.listDevices();
    let added = 0;
    for (const device of devices) {
      if (this.store.registerDevice(device)) added++;
    }
    this.needsDiscovery = false;
    this.cyclesSinceDiscovery = 0;
    this.logger.log(`Discovery found ${devices.length} devices (${added} new)`);
  }
}
