import { FairlandTransport, FairlandTransportOptions } from '../../src/services/fairland-transport';
import { isRecord } from '../../src/services/fairland-codec';
import { FAIRLAND_API } from '../../src/constants/fairland-api';
import { Session } from '../../src/types';
import { HttpClient, RequestOptions } from '../../src/util/http';
import {
  AuthError,
  AuthRejectedError,
  TransportError,
  UnsupportedOperationError
} from '../../src/util/error-handler';
import { TEST_CREDENTIAL, createMockLogger } from '../mocks';
import dataPointFixture from '../fixtures/heat-pump-data-points.json';

type Route = (body: Record<string, unknown>) => unknown;

const HOUR = 60 * 60 * 1000;

const envelope = (data: unknown): unknown => ({ code: FAIRLAND_API.SUCCESS_CODE, msg: 'success', data });

const SESSION: Session = {
  accessToken: 'auth-token',
  expiresAt: Date.now() + HOUR,
  refreshToken: null,
  userId: '42'
};

describe('FairlandTransport', () => {
  let routes: Map<string, Route>;
  let post: jest.Mock<Promise<unknown>, [string, RequestOptions?]>;
  let http: HttpClient;

  const createTransport = (overrides: Partial<FairlandTransportOptions> = {}): FairlandTransport =>
    new FairlandTransport({
      baseUrl: FAIRLAND_API.BASE_URL,
      groupId: null,
      requestTimeoutMs: 1_000,
      sessionTtlMs: HOUR,
      minRequestIntervalMs: 0,
      ...overrides
    }, createMockLogger(), http);

  const bodiesFor = (path: string): unknown[] =>
    post.mock.calls.filter(call => call[0] === path).map(call => call[1]?.body);

  beforeEach(() => {
    routes = new Map<string, Route>([
      [FAIRLAND_API.LOGIN, () => envelope({ authorization: 'auth-token', userId: 42 })],
      [FAIRLAND_API.GROUPS, () => envelope([{ id: 'group-1', name: 'Pool house' }])],
      [FAIRLAND_API.GROUP_DEVICES, () => envelope({
        bindDeviceInfos: [
          { id: 'dev-1', deviceName: 'Pool heat pump', categoryCode: 'heatPump', version: '2.1.0', sn: 'FL-0001' },
          { id: 'light-1', deviceName: 'Pool light', categoryCode: 'light' }
        ]
      })],
      [FAIRLAND_API.DATA_POINTS, () => envelope(dataPointFixture)],
      [FAIRLAND_API.SET_PROPERTY, () => envelope(null)]
    ]);

    post = jest.fn<Promise<unknown>, [string, RequestOptions?]>(async (path, options) => {
      const route = routes.get(path);
      if (!route) {
        throw new Error(`No route for ${path}`);
      }
      const body = options?.body;
      return route(isRecord(body) ? body : {});
    });
    http = { get: jest.fn(), post };
  });

  describe('login', () => {
    test('posts the credential and builds a session', async () => {
      const before = Date.now();
      const session = await createTransport().login(TEST_CREDENTIAL);

      expect(bodiesFor(FAIRLAND_API.LOGIN)).toEqual([{
        phoneCode: '49',
        accountName: 'pool@example.com',
        password: 'test-secret',
        countryCode: 'DE',
        randStr: '',
        ticket: ''
      }]);
      expect(session.accessToken).toBe('auth-token');
      expect(session.userId).toBe('42');
      expect(session.refreshToken).toBeNull();
      expect(session.expiresAt).toBeGreaterThanOrEqual(before + HOUR);
      expect(session.expiresAt).toBeLessThanOrEqual(Date.now() + HOUR);
    });

    test('a refused login is an AuthError carrying the vendor message', async () => {
      routes.set(FAIRLAND_API.LOGIN, () => ({ code: 400101, msg: 'Incorrect password', data: null }));

      await expect(createTransport().login(TEST_CREDENTIAL)).rejects.toMatchObject({
        name: 'AuthError',
        reason: 'Incorrect password (code 400101)'
      });
    });

    test('an HTTP rejection of the login is an AuthError', async () => {
      routes.set(FAIRLAND_API.LOGIN, () => {
        throw new AuthRejectedError('HTTP 401 Unauthorized', 401);
      });

      await expect(createTransport().login(TEST_CREDENTIAL)).rejects.toThrow(
        new AuthError('login rejected with HTTP 401').message
      );
    });

    test('a login response without a token is a fatal transport error', async () => {
      routes.set(FAIRLAND_API.LOGIN, () => envelope({ userId: 42 }));

      await expect(createTransport().login(TEST_CREDENTIAL)).rejects.toMatchObject({
        message: 'Login response carries no authorization token',
        kind: 'fatal'
      });
    });

    test('refresh logs in again', async () => {
      const session = await createTransport().refresh(SESSION, TEST_CREDENTIAL);

      expect(session.accessToken).toBe('auth-token');
      expect(bodiesFor(FAIRLAND_API.LOGIN)).toHaveLength(1);
    });
  });

  describe('listDevices', () => {
    test('walks every group and keeps only heat pumps', async () => {
      const devices = await createTransport().listDevices(SESSION);

      expect(devices).toEqual([{
        id: 'dev-1',
        name: 'Pool heat pump',
        model: 'Pool heat pump',
        groupId: 'group-1',
        firmwareVersion: '2.1.0',
        serialNumber: 'FL-0001',
        capabilities: {
          power: true,
          modes: ['auto', 'heat', 'cool'],
          targetTemperature: { min: 18, max: 40, step: 0.5 },
          presetModes: ['Smart', 'Silent', 'Boost'],
          parameters: { waterPumpTime: { min: 10, max: 60, step: 5 } }
        }
      }]);
      expect(bodiesFor(FAIRLAND_API.GROUPS)).toEqual([{ needDeviceCount: true }]);
      expect(bodiesFor(FAIRLAND_API.GROUP_DEVICES)).toEqual([{ deviceGroupId: 'group-1', shareId: null }]);
      expect(bodiesFor(FAIRLAND_API.DATA_POINTS)).toEqual([{ deviceId: 'dev-1' }]);
    });

    test('uses the configured group without listing groups', async () => {
      await createTransport({ groupId: 'group-9' }).listDevices(SESSION);

      expect(bodiesFor(FAIRLAND_API.GROUPS)).toEqual([]);
      expect(bodiesFor(FAIRLAND_API.GROUP_DEVICES)).toEqual([{ deviceGroupId: 'group-9', shareId: null }]);
    });

    test('sends the session token with every request', async () => {
      await createTransport().listDevices(SESSION);

      for (const call of post.mock.calls) {
        expect(call[1]?.headers).toEqual({ Authorization: 'auth-token' });
      }
    });

    test('a group response without a device list is fatal', async () => {
      routes.set(FAIRLAND_API.GROUP_DEVICES, () => envelope({}));

      await expect(createTransport().listDevices(SESSION)).rejects.toMatchObject({
        message: 'Group device response has no device list',
        kind: 'fatal'
      });
    });
  });

  describe('getStates', () => {
    test('returns a result per device', async () => {
      routes.set(FAIRLAND_API.DATA_POINTS, body => {
        if (body.deviceId === 'dev-2') {
          return { code: 500100, msg: 'device offline', data: null };
        }
        if (body.deviceId === 'dev-3') {
          throw new TransportError('HTTP 503 Service Unavailable', 'retryable', { status: 503 });
        }
        return envelope(dataPointFixture);
      });

      const results = await createTransport().getStates(SESSION, ['dev-1', 'dev-2', 'dev-3']);

      const first = results['dev-1'];
      expect(first.ok && first.snapshot.targetTemperature).toBe(28);

      const second = results['dev-2'];
      expect(second.ok).toBe(false);
      expect(second.ok ? null : second.error.message)
        .toBe(`${FAIRLAND_API.DATA_POINTS} failed: device offline (code 500100)`);
      expect(second.ok ? null : second.error.retryable).toBe(false);

      const third = results['dev-3'];
      expect(third.ok ? null : third.error.retryable).toBe(true);
    });

    test('a session rejection aborts the batch', async () => {
      routes.set(FAIRLAND_API.DATA_POINTS, () => {
        throw new AuthRejectedError('HTTP 401 Unauthorized', 401);
      });

      await expect(createTransport().getStates(SESSION, ['dev-1', 'dev-2'])).rejects.toBeInstanceOf(AuthRejectedError);
      expect(bodiesFor(FAIRLAND_API.DATA_POINTS)).toHaveLength(1);
    });

    test('unexpected failures are wrapped per device', async () => {
      routes.set(FAIRLAND_API.DATA_POINTS, () => {
        throw new Error('socket hang up');
      });

      const results = await createTransport().getStates(SESSION, ['dev-1']);

      const result = results['dev-1'];
      expect(result.ok ? null : result.error).toBeInstanceOf(TransportError);
      expect(result.ok ? null : result.error.message).toBe('socket hang up');
    });
  });

  describe('sendCommand', () => {
    test('writes the target temperature to its data point', async () => {
      await createTransport().sendCommand(SESSION, 'dev-1', 'targetTemperature', 30);

      expect(bodiesFor(FAIRLAND_API.SET_PROPERTY)).toEqual([{
        deviceId: 'dev-1',
        dpIdValues: [{ type: '', dpId: '107', value: 30 }]
      }]);
    });

    test('encodes the mode as its numeric code', async () => {
      await createTransport().sendCommand(SESSION, 'dev-1', 'mode', 'cool');

      expect(bodiesFor(FAIRLAND_API.SET_PROPERTY)).toEqual([{
        deviceId: 'dev-1',
        dpIdValues: [{ type: '', dpId: '106', value: 2 }]
      }]);
    });

    test('writes an installer setting to its own data point', async () => {
      await createTransport().sendCommand(SESSION, 'dev-1', 'waterPumpTime', 35);

      expect(bodiesFor(FAIRLAND_API.SET_PROPERTY)).toEqual([{
        deviceId: 'dev-1',
        dpIdValues: [{ type: '', dpId: '117', value: 35 }]
      }]);
    });

    test('learns running-mode codes before setting a preset', async () => {
      const transport = createTransport();

      await transport.sendCommand(SESSION, 'dev-1', 'presetMode', 'Boost');
      await transport.sendCommand(SESSION, 'dev-1', 'presetMode', 'Smart');

      expect(bodiesFor(FAIRLAND_API.DATA_POINTS)).toHaveLength(1);
      expect(bodiesFor(FAIRLAND_API.SET_PROPERTY)).toEqual([
        { deviceId: 'dev-1', dpIdValues: [{ type: '', dpId: '102', value: 2 }] },
        { deviceId: 'dev-1', dpIdValues: [{ type: '', dpId: '102', value: 0 }] }
      ]);
    });

    test('an unknown preset is refused before anything is written', async () => {
      await expect(createTransport().sendCommand(SESSION, 'dev-1', 'presetMode', 'Turbo'))
        .rejects.toBeInstanceOf(UnsupportedOperationError);
      expect(bodiesFor(FAIRLAND_API.SET_PROPERTY)).toEqual([]);
    });

    test('a rejected write is a fatal transport error', async () => {
      routes.set(FAIRLAND_API.SET_PROPERTY, () => ({ code: 400200, msg: 'value out of range', data: null }));

      await expect(createTransport().sendCommand(SESSION, 'dev-1', 'power', false)).rejects.toMatchObject({
        message: `${FAIRLAND_API.SET_PROPERTY} failed: value out of range (code 400200)`,
        kind: 'fatal'
      });
    });
  });
});
