import {
  CloudTransport,
  CommandField,
  CommandValue,
  Credential,
  Device,
  DeviceFetchResult,
  DeviceSnapshot,
  Session,
  emptySnapshot
} from '../../src/types';
import { TransportError } from '../../src/util/error-handler';
import { validateCommand } from '../../src/services/command-dispatcher';
import { withUpdate } from '../../src/services/state-store';

export const TEST_CREDENTIAL: Credential = {
  username: 'pool@example.com',
  password: 'test-secret',
  countryCode: 'DE',
  phoneCode: '49'
};

export function makeDevice(id: string, overrides: Partial<Device> = {}): Device {
  return {
    id,
    name: `Heat pump ${id}`,
    model: 'InverterX',
    groupId: 'group-1',
    firmwareVersion: '1.0.0',
    serialNumber: `SN-${id}`,
    capabilities: {
      power: true,
      modes: ['auto', 'heat', 'cool'],
      targetTemperature: { min: 8, max: 40, step: 1 },
      presetModes: ['Smart', 'Silent', 'Boost'],
      parameters: { waterPumpTime: { min: 10, max: 120, step: 5 } }
    },
    ...overrides
  };
}

export function makeSnapshot(overrides: Partial<DeviceSnapshot> = {}): DeviceSnapshot {
  return {
    ...emptySnapshot(),
    power: true,
    mode: 'heat',
    presetMode: 'Smart',
    targetTemperature: 28,
    currentTemperature: 26.5,
    powerDraw: 1.2,
    ...overrides
  };
}

/**
 * In-memory cloud. Devices hold a snapshot; with `applyCommands` on, an
 * accepted command changes the snapshot the next poll returns.
 */
export class FakeTransport implements CloudTransport {
  readonly snapshots = new Map<string, DeviceSnapshot>();
  applyCommands = true;
  private sessionCount = 0;

  login = jest.fn(async (_credential: Credential): Promise<Session> => this.issueSession());

  refresh = jest.fn(async (_session: Session, _credential: Credential): Promise<Session> => this.issueSession());

  listDevices = jest.fn(async (_session: Session): Promise<Device[]> => [...this.devices]);

  getStates = jest.fn(async (_session: Session, deviceIds: string[]): Promise<Record<string, DeviceFetchResult>> => {
    const results: Record<string, DeviceFetchResult> = {};
    for (const id of deviceIds) {
      const snapshot = this.snapshots.get(id);
      results[id] = snapshot
        ? { ok: true, snapshot: { ...snapshot, faults: [...snapshot.faults] } }
        : { ok: false, error: new TransportError(`Device ${id} not found`, 'fatal') };
    }
    return results;
  });

  sendCommand = jest.fn(async (_session: Session, deviceId: string, field: CommandField, value: CommandValue): Promise<void> => {
    if (!this.applyCommands) return;
    const device = this.devices.find(candidate => candidate.id === deviceId);
    const snapshot = this.snapshots.get(deviceId);
    if (device && snapshot) {
      this.snapshots.set(deviceId, withUpdate(snapshot, validateCommand(device.capabilities, field, value)));
    }
  });

  constructor(readonly devices: Device[] = [makeDevice('hp-1')]) {
    for (const device of devices) {
      this.snapshots.set(device.id, makeSnapshot());
    }
  }

  private issueSession(): Session {
    this.sessionCount++;
    return {
      accessToken: `token-${this.sessionCount}`,
      expiresAt: Date.now() + 60 * 60 * 1000,
      refreshToken: null,
      userId: 'user-1'
    };
  }
}

/**
 * Resolve once `predicate` holds, polling on real timers
 */
export async function waitUntil(predicate: () => boolean, timeoutMs: number = 2000, intervalMs: number = 5): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise(resolve => setTimeout(resolve, intervalMs));
  }
}
