import { randomUUID } from 'crypto';
import {
  COMMAND_FIELDS,
  CommandField,
  CommandHandle,
  CommandListener,
  CommandOutcome,
  CommandStatus,
  CommandValue,
  DeviceCapabilities,
  DeviceSnapshot,
  FieldUpdate,
  NumericRange,
  TerminalCommandStatus
} from '../types';
import { StateStore, controlValue, toPartial } from './state-store';
import { CloudClient } from './cloud-client';
import { Logger } from '../util/logger';
import {
  AppError,
  CommandTimeoutError,
  DeviceNotFoundError,
  EngineStoppedError,
  ErrorHandler,
  SupersededError,
  UnsupportedOperationError,
  ValidationError,
  isRetryableTransportError
} from '../util/error-handler';
import { validateBoolean, validateNumber, validateOneOf } from '../util/validation';
import { backoffDelay, delay } from '../util/async';

export interface CommandDispatcherOptions {
  maxCommandAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  /** Corroboration deadline, counted from the cloud's acceptance */
  commandTimeoutMs: number;
  /** Called once the cloud accepts a command, to hurry the next poll */
  onAccepted?: (handle: CommandHandle) => void;
}

// Reported temperatures may be rounded by the device
const NUMERIC_TOLERANCE = 0.05;

interface CommandRecord {
  handle: CommandHandle;
  update: FieldUpdate;
  status: CommandStatus;
  attempts: number;
  acceptedAt: number | null;
  abort: AbortController;
  expiryTimer: NodeJS.Timeout | null;
  settle: (outcome: CommandOutcome) => void;
}

/**
 * Check a command against the device's capabilities
 * @throws UnsupportedOperationError when the device does not accept the value
 */
export function validateCommand(
  capabilities: DeviceCapabilities,
  field: CommandField,
  value: CommandValue
): FieldUpdate {
  try {
    const checked = validateOneOf(field, 'field', COMMAND_FIELDS);
    switch (checked) {
      case 'power':
        if (!capabilities.power) break;
        return { field: 'power', value: validateBoolean(value, 'power') };

      case 'mode':
        if (capabilities.modes.length === 0) break;
        return { field: 'mode', value: validateOneOf(value, 'mode', capabilities.modes) };

      case 'targetTemperature': {
        const range = capabilities.targetTemperature;
        if (!range) break;
        const target = validateNumber(value, 'targetTemperature', { min: range.min, max: range.max });
        const steps = (target - range.min) / range.step;
        if (Math.abs(steps - Math.round(steps)) > 1e-6) {
          throw new ValidationError(`Invalid targetTemperature: must be a multiple of ${range.step} from ${range.min}`);
        }
        return { field: 'targetTemperature', value: target };
      }

      case 'presetMode':
        if (capabilities.presetModes.length === 0) break;
        return { field: 'presetMode', value: validateOneOf(value, 'presetMode', capabilities.presetModes) };

      default: {
        const range = capabilities.parameters[checked];
        if (!range) break;
        return { field: checked, value: snapToStep(validateNumber(value, checked, range), range) };
      }
    }
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new UnsupportedOperationError(error.message, { field, value });
    }
    throw error;
  }

  throw new UnsupportedOperationError(`Device does not support setting ${field}`, { field });
}

/**
 * Round onto the range's step grid, counted from its minimum
 */
function snapToStep(value: number, range: NumericRange): number {
  const steps = Math.round((value - range.min) / range.step);
  const snapped = Math.min(range.max, range.min + steps * range.step);
  return Math.round(snapped * 100) / 100;
}

function matches(baseline: DeviceSnapshot, update: FieldUpdate): boolean {
  const reported = controlValue(baseline, update.field);
  if (typeof reported === 'number' && typeof update.value === 'number') {
    return Math.abs(reported - update.value) <= NUMERIC_TOLERANCE;
  }
  return reported === update.value;
}

/**
 * Command Dispatcher
 *
 * Runs each command through pending -> confirmed | failed | expired. A command
 * is confirmed only when a poll taken after the cloud accepted it reports the
 * requested value; acceptance alone never counts as success.
 */
export class CommandDispatcher {
  private readonly pending = new Map<string, CommandRecord>();
  // Latest pending command per device and field
  private readonly latestByField = new Map<string, CommandRecord>();
  // Tail of the send queue per device and field
  private readonly sendChains = new Map<string, Promise<void>>();
  private readonly listeners = new Set<CommandListener>();
  private readonly errorHandler: ErrorHandler;
  private readonly unsubscribeConfirmed: () => void;
  private stopped = false;

  constructor(
    private readonly store: StateStore,
    private readonly client: Pick<CloudClient, 'sendCommand'>,
    private readonly logger: Logger,
    private readonly options: CommandDispatcherOptions
  ) {
    this.errorHandler = new ErrorHandler(logger);
    this.unsubscribeConfirmed = store.onConfirmed((deviceId, baseline, observedAt) =>
      this.corroborate(deviceId, baseline, observedAt)
    );
  }

  /**
   * Validate, apply optimistically and send in the background
   * @throws UnsupportedOperationError, DeviceNotFoundError or EngineStoppedError, synchronously
   */
  issueCommand(deviceId: string, field: CommandField, value: CommandValue): CommandHandle {
    if (this.stopped) {
      throw new EngineStoppedError();
    }
    const device = this.store.getDevice(deviceId);
    if (!device) {
      throw new DeviceNotFoundError(deviceId);
    }
    const update = validateCommand(device.capabilities, field, value);

    const id = randomUUID();
    let settle: (outcome: CommandOutcome) => void = () => undefined;
    const completion = new Promise<CommandOutcome>(resolve => {
      settle = resolve;
    });

    const record: CommandRecord = {
      handle: {
        id,
        deviceId,
        field: update.field,
        value: update.value,
        createdAt: Date.now(),
        get status(): CommandStatus {
          return record.status;
        },
        completion
      },
      update,
      status: 'pending',
      attempts: 0,
      acceptedAt: null,
      abort: new AbortController(),
      expiryTimer: null,
      settle
    };

    this.store.applyOptimistic(deviceId, toPartial(update), id);

    const key = fieldKey(deviceId, update.field);
    const previous = this.latestByField.get(key);
    this.pending.set(id, record);
    this.latestByField.set(key, record);
    if (previous && previous.status === 'pending') {
      // The new shadow already replaced the old one; nothing to revert
      this.finish(previous, 'failed', new SupersededError(id, { commandId: previous.handle.id }), false);
    }

    this.logger.log(`Command ${id}: ${deviceId} ${update.field} -> ${String(update.value)}`);
    this.enqueueSend(key, record);
    return record.handle;
  }

  onCommandSettled(listener: CommandListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Stop issuing network calls and expire every pending command
   */
  shutdown(): void {
    if (this.stopped) return;
    this.stopped = true;
    this.unsubscribeConfirmed();

    for (const record of [...this.pending.values()]) {
      this.finish(
        record,
        'expired',
        new CommandTimeoutError('Engine shut down before the command was confirmed', { commandId: record.handle.id }),
        true
      );
    }
  }

  /**
   * Sends for one device field go out in command order; each waits for the
   * previous one to finish its current attempt
   */
  private enqueueSend(key: string, record: CommandRecord): void {
    const previous = this.sendChains.get(key) ?? Promise.resolve();
    const next = previous
      .then(() => this.send(record))
      .catch(error => {
        this.logger.error(`Command ${record.handle.id} send loop failed`, error);
      });
    this.sendChains.set(key, next);
    next.then(() => {
      if (this.sendChains.get(key) === next) {
        this.sendChains.delete(key);
      }
    }).catch(error => {
      this.logger.error('Send chain cleanup failed', error);
    });
  }

  private async send(record: CommandRecord): Promise<void> {
    const { handle, update } = record;
    const maxAttempts = this.options.maxCommandAttempts;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (record.status !== 'pending' || this.stopped) return;
      record.attempts = attempt;

      try {
        await this.client.sendCommand(handle.deviceId, update.field, update.value);
      } catch (error) {
        if (record.status !== 'pending') return;

        if (isRetryableTransportError(error) && attempt < maxAttempts) {
          const wait = Math.min(
            this.options.retryMaxDelayMs,
            Math.max(
              backoffDelay(attempt, this.options.retryBaseDelayMs, this.options.retryMaxDelayMs),
              error.retryAfterMs ?? 0
            )
          );
          this.logger.warn(`Command ${handle.id} attempt ${attempt}/${maxAttempts} failed, retrying in ${wait}ms`, {
            error: error.message
          });
          const proceed = await delay(wait, record.abort.signal);
          if (!proceed) return;
          continue;
        }

        const appError = this.errorHandler.logError(error, { commandId: handle.id, deviceId: handle.deviceId, attempt });
        this.finish(record, 'failed', appError, true);
        return;
      }

      this.accepted(record);
      return;
    }
  }

  private accepted(record: CommandRecord): void {
    if (record.status !== 'pending') return;

    record.acceptedAt = Date.now();
    record.expiryTimer = setTimeout(() => {
      record.expiryTimer = null;
      this.finish(
        record,
        'expired',
        new CommandTimeoutError(
          `Command ${record.handle.id} not confirmed within ${this.options.commandTimeoutMs}ms`,
          { commandId: record.handle.id, deviceId: record.handle.deviceId }
        ),
        true
      );
    }, this.options.commandTimeoutMs);

    this.logger.debug(`Command ${record.handle.id} accepted by the cloud, awaiting confirmation`);
    this.options.onAccepted?.(record.handle);
  }

  private corroborate(deviceId: string, baseline: DeviceSnapshot, observedAt: number): void {
    for (const record of [...this.pending.values()]) {
      if (record.handle.deviceId !== deviceId || record.acceptedAt === null) continue;
      if (observedAt < record.acceptedAt) continue;
      if (matches(baseline, record.update)) {
        this.finish(record, 'confirmed', null, true);
      }
    }
  }

  /**
   * Move a command to its terminal status exactly once
   * @param resolveShadow Whether the command still owns its optimistic shadow
   */
  private finish(record: CommandRecord, status: TerminalCommandStatus, error: AppError | null, resolveShadow: boolean): void {
    if (record.status !== 'pending') return;

    record.status = status;
    record.abort.abort();
    if (record.expiryTimer) {
      clearTimeout(record.expiryTimer);
      record.expiryTimer = null;
    }

    const { handle } = record;
    this.pending.delete(handle.id);
    const key = fieldKey(handle.deviceId, handle.field);
    if (this.latestByField.get(key) === record) {
      this.latestByField.delete(key);
    }

    if (resolveShadow) {
      this.store.resolve(handle.id, status === 'confirmed' ? 'success' : 'failure');
    }

    const outcome: CommandOutcome = {
      commandId: handle.id,
      deviceId: handle.deviceId,
      field: handle.field,
      value: handle.value,
      status,
      attempts: record.attempts,
      error,
      settledAt: Date.now()
    };

    if (status === 'confirmed') {
      this.logger.log(`Command ${handle.id} confirmed after ${record.attempts} attempt(s)`);
    } else {
      this.logger.warn(`Command ${handle.id} ${status}: ${error?.message ?? 'no reason'}`);
    }

    record.settle(outcome);
    for (const listener of this.listeners) {
      try {
        listener(outcome);
      } catch (listenerError) {
        this.logger.error('Command listener threw', listenerError);
      }
    }
  }
}

function fieldKey(deviceId: string, field: CommandField): string {
  return `${deviceId}:${field}`;
}
