import {
  COMMAND_FIELDS,
  CommandField,
  CommandValue,
  ControlValues,
  Device,
  DeviceSnapshot,
  DeviceState,
  FieldUpdate,
  PARAMETER_FIELDS,
  StateChangeKind,
  StateListener,
  emptySnapshot
} from '../types';
import { Logger } from '../util/logger';
import { DeviceNotFoundError } from '../util/error-handler';

export type ResolveOutcome = 'success' | 'failure';

/**
 * Called after a confirmed snapshot has been stored, with the new baseline
 */
export type ConfirmationListener = (deviceId: string, baseline: DeviceSnapshot, observedAt: number) => void;

interface Shadow {
  commandId: string;
  update: FieldUpdate;
}

interface DeviceEntry {
  device: Device;
  baseline: DeviceSnapshot;
  shadows: Map<CommandField, Shadow>;
  revision: number;
  unavailable: boolean;
  unavailableReason: string | null;
  confirmedAt: number | null;
  updatedAt: number;
  view: DeviceState;
}

/**
 * Split a partial control update into typed field updates
 */
export function toFieldUpdates(partial: Partial<ControlValues>): FieldUpdate[] {
  const updates: FieldUpdate[] = [];
  if (partial.power !== undefined) updates.push({ field: 'power', value: partial.power });
  if (partial.mode !== undefined) updates.push({ field: 'mode', value: partial.mode });
  if (partial.targetTemperature !== undefined) updates.push({ field: 'targetTemperature', value: partial.targetTemperature });
  if (partial.presetMode !== undefined) updates.push({ field: 'presetMode', value: partial.presetMode });
  for (const field of PARAMETER_FIELDS) {
    const value = partial[field];
    if (value !== undefined) updates.push({ field, value });
  }
  return updates;
}

export function toPartial(update: FieldUpdate): Partial<ControlValues> {
  switch (update.field) {
    case 'power': return { power: update.value };
    case 'mode': return { mode: update.value };
    case 'targetTemperature': return { targetTemperature: update.value };
    case 'presetMode': return { presetMode: update.value };
    default: {
      const partial: Partial<ControlValues> = {};
      partial[update.field] = update.value;
      return partial;
    }
  }
}

export function withUpdate(snapshot: DeviceSnapshot, update: FieldUpdate): DeviceSnapshot {
  switch (update.field) {
    case 'power': return { ...snapshot, power: update.value };
    case 'mode': return { ...snapshot, mode: update.value };
    case 'targetTemperature': return { ...snapshot, targetTemperature: update.value };
    case 'presetMode': return { ...snapshot, presetMode: update.value };
    default: {
      const next = { ...snapshot };
      next[update.field] = update.value;
      return next;
    }
  }
}

export function controlValue(snapshot: DeviceSnapshot, field: CommandField): CommandValue | null {
  return snapshot[field];
}

function copySnapshot(snapshot: DeviceSnapshot): DeviceSnapshot {
  return { ...snapshot, faults: [...snapshot.faults], diagnostics: { ...snapshot.diagnostics } };
}

/**
 * State Store
 *
 * The one mutable shared object of the engine. Every mutator runs to
 * completion synchronously, so no mutation interleaves with another;
 * listeners are called once the mutation is done, in mutation order.
 *
 * Per device the store keeps a confirmed baseline and, per field, at most
 * one optimistic shadow owned by a pending command. The visible state is the
 * baseline overlaid with the shadows.
 */
export class StateStore {
  private readonly entries = new Map<string, DeviceEntry>();
  private readonly listeners = new Set<StateListener>();
  private readonly confirmationListeners = new Set<ConfirmationListener>();
  private readonly queue: Array<() => void> = [];
  private draining = false;

  constructor(private readonly logger: Logger) { }

  get(deviceId: string): DeviceState | undefined {
    return this.entries.get(deviceId)?.view;
  }

  getDevice(deviceId: string): Device | undefined {
    return this.entries.get(deviceId)?.device;
  }

  getDevices(): Device[] {
    return [...this.entries.values()].map(entry => entry.device);
  }

  deviceIds(): string[] {
    return [...this.entries.keys()];
  }

  /**
   * Latest confirmed values, without optimistic overlays
   */
  getBaseline(deviceId: string): DeviceSnapshot | undefined {
    const entry = this.entries.get(deviceId);
    return entry ? copySnapshot(entry.baseline) : undefined;
  }

  /**
   * Add a discovered device. The device set only grows; rediscovery refreshes
   * the metadata without touching state.
   * @returns True when the device was new
   */
  registerDevice(device: Device): boolean {
    const existing = this.entries.get(device.id);
    if (existing) {
      existing.device = device;
      return false;
    }

    const now = Date.now();
    const entry: DeviceEntry = {
      device,
      baseline: emptySnapshot(),
      shadows: new Map(),
      revision: 0,
      unavailable: false,
      unavailableReason: null,
      confirmedAt: null,
      updatedAt: now,
      view: this.placeholderView(device.id, now)
    };
    this.entries.set(device.id, entry);
    this.logger.log(`Device discovered: ${device.name} (${device.id})`);
    this.commit(entry, 'discovered');
    return true;
  }

  /**
   * Store an authoritative snapshot. Shadowed fields keep showing their
   * optimistic value; the snapshot becomes their baseline underneath.
   */
  applyConfirmed(deviceId: string, snapshot: DeviceSnapshot, observedAt: number = Date.now()): void {
    const entry = this.require(deviceId);
    entry.baseline = copySnapshot(snapshot);
    entry.confirmedAt = observedAt;
    entry.unavailable = false;
    entry.unavailableReason = null;
    this.commit(entry, 'confirmed');

    const baseline = copySnapshot(entry.baseline);
    for (const listener of this.confirmationListeners) {
      this.enqueue(() => listener(deviceId, baseline, observedAt));
    }
    this.drain();
  }

  /**
   * Shadow the given fields with a pending command's values. A field already
   * shadowed by another command is taken over.
   * @throws DeviceNotFoundError
   */
  applyOptimistic(deviceId: string, partialUpdate: Partial<ControlValues>, commandId: string): void {
    const entry = this.require(deviceId);
    const updates = toFieldUpdates(partialUpdate);
    if (updates.length === 0) return;

    for (const update of updates) {
      entry.shadows.set(update.field, { commandId, update });
    }
    this.commit(entry, 'optimistic');
  }

  /**
   * Clear the shadows owned by a command. On success the command's values
   * become the baseline; on failure the baseline shows through again.
   * @returns True when the command still owned a shadow
   */
  resolve(commandId: string, outcome: ResolveOutcome): boolean {
    let resolved = false;

    for (const entry of this.entries.values()) {
      let touched = false;
      for (const [field, shadow] of entry.shadows) {
        if (shadow.commandId !== commandId) continue;
        entry.shadows.delete(field);
        if (outcome === 'success') {
          entry.baseline = withUpdate(entry.baseline, shadow.update);
        }
        touched = true;
      }
      if (touched) {
        resolved = true;
        this.commit(entry, 'resolved');
      }
    }

    return resolved;
  }

  /**
   * Flag a device as unreachable. Its last state is kept.
   */
  markUnavailable(deviceId: string, reason: string): void {
    const entry = this.require(deviceId);
    if (entry.unavailable && entry.unavailableReason === reason) return;

    entry.unavailable = true;
    entry.unavailableReason = reason;
    this.logger.warn(`Device ${deviceId} marked unavailable: ${reason}`);
    this.commit(entry, 'availability');
  }

  /**
   * @returns Function that removes the listener
   */
  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onConfirmed(listener: ConfirmationListener): () => void {
    this.confirmationListeners.add(listener);
    return () => {
      this.confirmationListeners.delete(listener);
    };
  }

  private require(deviceId: string): DeviceEntry {
    const entry = this.entries.get(deviceId);
    if (!entry) {
      throw new DeviceNotFoundError(deviceId);
    }
    return entry;
  }

  /**
   * Bump the revision, rebuild the visible state and queue notifications
   */
  private commit(entry: DeviceEntry, kind: StateChangeKind): void {
    entry.revision++;
    entry.updatedAt = Date.now();
    entry.view = this.buildView(entry);

    const state = entry.view;
    for (const listener of this.listeners) {
      this.enqueue(() => listener(state, kind));
    }
    this.drain();
  }

  private buildView(entry: DeviceEntry): DeviceState {
    let values = copySnapshot(entry.baseline);
    const pendingCommands: DeviceState['pendingCommands'] = {};

    for (const field of COMMAND_FIELDS) {
      const shadow = entry.shadows.get(field);
      if (!shadow) continue;
      values = withUpdate(values, shadow.update);
      pendingCommands[field] = shadow.commandId;
    }

    Object.freeze(values.faults);
    Object.freeze(values.diagnostics);
    const view: DeviceState = {
      deviceId: entry.device.id,
      values: Object.freeze(values),
      revision: entry.revision,
      source: entry.shadows.size > 0 ? 'optimistic' : 'confirmed',
      pendingCommands: Object.freeze(pendingCommands),
      unavailable: entry.unavailable,
      unavailableReason: entry.unavailableReason,
      confirmedAt: entry.confirmedAt,
      updatedAt: entry.updatedAt
    };
    return Object.freeze(view);
  }

  private placeholderView(deviceId: string, now: number): DeviceState {
    return {
      deviceId,
      values: emptySnapshot(),
      revision: 0,
      source: 'confirmed',
      pendingCommands: {},
      unavailable: false,
      unavailableReason: null,
      confirmedAt: null,
      updatedAt: now
    };
  }

  private enqueue(notification: () => void): void {
    this.queue.push(notification);
  }

  /**
   * Deliver queued notifications. A listener that mutates the store only
   * appends to the queue; the outermost drain delivers it afterwards.
   */
  private drain(): void {
    if (this.draining) return;
    this.draining = true;
    try {
      let notification = this.queue.shift();
      while (notification) {
        try {
          notification();
        } catch (error) {
          this.logger.error('State listener threw', error);
        }
        notification = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }
}
