import { StateStore, toFieldUpdates } from '../../src/services/state-store';
import { DeviceState, StateChangeKind } from '../../src/types';
import { DeviceNotFoundError } from '../../src/util/error-handler';
import { createMockLogger, makeDevice, makeSnapshot } from '../mocks';

describe('StateStore', () => {
  let store: StateStore;
  let notifications: Array<{ state: DeviceState; kind: StateChangeKind }>;

  beforeEach(() => {
    store = new StateStore(createMockLogger());
    notifications = [];
    store.subscribe((state, kind) => notifications.push({ state, kind }));
    store.registerDevice(makeDevice('hp-1'));
  });

  test('registering a device publishes an empty state at revision 1', () => {
    expect(notifications).toHaveLength(1);
    expect(notifications[0].kind).toBe('discovered');
    expect(notifications[0].state.revision).toBe(1);
    expect(notifications[0].state.values.targetTemperature).toBeNull();
    expect(store.deviceIds()).toEqual(['hp-1']);
  });

  test('registering a known device again changes nothing', () => {
    expect(store.registerDevice(makeDevice('hp-1', { name: 'Renamed' }))).toBe(false);
    expect(notifications).toHaveLength(1);
    expect(store.getDevice('hp-1')?.name).toBe('Renamed');
  });

  test('applyConfirmed stores the snapshot and marks the state confirmed', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ targetTemperature: 28 }), 1000);

    const state = store.get('hp-1');
    expect(state?.values.targetTemperature).toBe(28);
    expect(state?.source).toBe('confirmed');
    expect(state?.confirmedAt).toBe(1000);
    expect(state?.revision).toBe(2);
  });

  test('optimistic value is visible while pending and confirmed data stays underneath', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ targetTemperature: 28 }));
    store.applyOptimistic('hp-1', { targetTemperature: 30 }, 'cmd-1');

    expect(store.get('hp-1')?.values.targetTemperature).toBe(30);
    expect(store.get('hp-1')?.source).toBe('optimistic');
    expect(store.get('hp-1')?.pendingCommands).toEqual({ targetTemperature: 'cmd-1' });

    // A poll that still reports the old value does not override the shadow
    store.applyConfirmed('hp-1', makeSnapshot({ targetTemperature: 28, currentTemperature: 27 }));
    expect(store.get('hp-1')?.values.targetTemperature).toBe(30);
    expect(store.get('hp-1')?.values.currentTemperature).toBe(27);
    expect(store.getBaseline('hp-1')?.targetTemperature).toBe(28);
  });

  test('resolve with failure reverts to the latest confirmed baseline', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ power: true }));
    store.applyOptimistic('hp-1', { power: false }, 'cmd-1');
    store.applyConfirmed('hp-1', makeSnapshot({ power: true, targetTemperature: 29 }));

    expect(store.resolve('cmd-1', 'failure')).toBe(true);

    const state = store.get('hp-1');
    expect(state?.values.power).toBe(true);
    expect(state?.values.targetTemperature).toBe(29);
    expect(state?.source).toBe('confirmed');
    expect(state?.pendingCommands).toEqual({});
  });

  test('resolve with success adopts the command value as baseline', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ mode: 'heat' }));
    store.applyOptimistic('hp-1', { mode: 'cool' }, 'cmd-1');

    store.resolve('cmd-1', 'success');

    expect(store.get('hp-1')?.values.mode).toBe('cool');
    expect(store.getBaseline('hp-1')?.mode).toBe('cool');
    expect(store.get('hp-1')?.source).toBe('confirmed');
  });

  test('resolving a command that no longer owns a shadow is a no-op', () => {
    store.applyOptimistic('hp-1', { targetTemperature: 30 }, 'cmd-1');
    store.applyOptimistic('hp-1', { targetTemperature: 31 }, 'cmd-2');
    const revision = store.get('hp-1')?.revision;

    expect(store.resolve('cmd-1', 'failure')).toBe(false);
    expect(store.get('hp-1')?.revision).toBe(revision);
    expect(store.get('hp-1')?.values.targetTemperature).toBe(31);
  });

  test('shadows on different fields resolve independently', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ power: true, targetTemperature: 28 }));
    store.applyOptimistic('hp-1', { power: false }, 'cmd-power');
    store.applyOptimistic('hp-1', { targetTemperature: 32 }, 'cmd-target');

    store.resolve('cmd-power', 'failure');

    const state = store.get('hp-1');
    expect(state?.values.power).toBe(true);
    expect(state?.values.targetTemperature).toBe(32);
    expect(state?.source).toBe('optimistic');
    expect(state?.pendingCommands).toEqual({ targetTemperature: 'cmd-target' });
  });

  test('markUnavailable flags the device and keeps its values; the next confirmation clears it', () => {
    store.applyConfirmed('hp-1', makeSnapshot({ targetTemperature: 28 }));
    store.markUnavailable('hp-1', 'Device offline');

    expect(store.get('hp-1')?.unavailable).toBe(true);
    expect(store.get('hp-1')?.unavailableReason).toBe('Device offline');
    expect(store.get('hp-1')?.values.targetTemperature).toBe(28);

    // Same reason again does not publish a new revision
    const count = notifications.length;
    store.markUnavailable('hp-1', 'Device offline');
    expect(notifications).toHaveLength(count);

    store.applyConfirmed('hp-1', makeSnapshot());
    expect(store.get('hp-1')?.unavailable).toBe(false);
    expect(store.get('hp-1')?.unavailableReason).toBeNull();
  });

  test('revisions delivered to listeners strictly increase', () => {
    store.applyConfirmed('hp-1', makeSnapshot());
    store.applyOptimistic('hp-1', { power: false }, 'cmd-1');
    store.markUnavailable('hp-1', 'timeout');
    store.resolve('cmd-1', 'success');
    store.applyConfirmed('hp-1', makeSnapshot());

    const revisions = notifications.map(entry => entry.state.revision);
    expect(revisions).toEqual([1, 2, 3, 4, 5, 6]);
    expect(notifications.map(entry => entry.kind)).toEqual([
      'discovered', 'confirmed', 'optimistic', 'availability', 'resolved', 'confirmed'
    ]);
  });

  test('a listener that mutates the store does not reorder deliveries', () => {
    const seen: number[] = [];
    store.subscribe((_state, kind) => {
      if (kind === 'confirmed') {
        store.applyOptimistic('hp-1', { power: false }, 'cmd-nested');
      }
    });
    store.subscribe(state => seen.push(state.revision));

    store.applyConfirmed('hp-1', makeSnapshot());

    expect(seen).toEqual([2, 3]);
    expect(store.get('hp-1')?.values.power).toBe(false);
  });

  test('a throwing listener does not stop other listeners', () => {
    const logger = createMockLogger();
    const isolated = new StateStore(logger);
    const received: number[] = [];
    isolated.subscribe(() => {
      throw new Error('listener failure');
    });
    isolated.subscribe(state => received.push(state.revision));

    isolated.registerDevice(makeDevice('hp-2'));

    expect(received).toEqual([1]);
    expect(logger.error).toHaveBeenCalledWith('State listener threw', expect.any(Error));
  });

  test('unsubscribe stops notifications', () => {
    const listener = jest.fn();
    const unsubscribe = store.subscribe(listener);
    unsubscribe();

    store.applyConfirmed('hp-1', makeSnapshot());

    expect(listener).not.toHaveBeenCalled();
  });

  test('confirmation listeners receive the baseline after subscribers', () => {
    const order: string[] = [];
    store.subscribe((_state, kind) => order.push(`state:${kind}`));
    store.onConfirmed((deviceId, baseline, observedAt) => {
      order.push(`confirmed:${deviceId}:${baseline.targetTemperature}:${observedAt}`);
    });

    store.applyConfirmed('hp-1', makeSnapshot({ targetTemperature: 25 }), 42);

    expect(order).toEqual(['state:confirmed', 'confirmed:hp-1:25:42']);
  });

  test('published states are frozen', () => {
    store.applyConfirmed('hp-1', makeSnapshot());
    const state = store.get('hp-1');

    expect(Object.isFrozen(state)).toBe(true);
    expect(Object.isFrozen(state?.values)).toBe(true);
  });

  test('mutating an unknown device throws DeviceNotFoundError', () => {
    expect(() => store.applyConfirmed('missing', makeSnapshot())).toThrow(DeviceNotFoundError);
    expect(() => store.applyOptimistic('missing', { power: true }, 'cmd-1')).toThrow(DeviceNotFoundError);
    expect(store.get('missing')).toBeUndefined();
  });

  test('toFieldUpdates splits a partial update per field', () => {
    expect(toFieldUpdates({ power: false, targetTemperature: 30 })).toEqual([
      { field: 'power', value: false },
      { field: 'targetTemperature', value: 30 }
    ]);
  });
});
