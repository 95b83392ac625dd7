import { DateTime } from 'luxon';
import { BaseApiService } from './base-api-service';
import {
  DataPoint,
  decodeCapabilities,
  decodeSnapshot,
  encodeCommand,
  isRecord,
  parseDataPoints,
  presetModeTable,
  readString
} from './fairland-codec';
import { FAIRLAND_API } from '../constants/fairland-api';
import { EngineConfig } from '../config/engine-config';
import {
  CloudTransport,
  CommandField,
  CommandValue,
  Credential,
  Device,
  DeviceFetchResult,
  Session
} from '../types';
import { HttpClient, createHttpClient } from '../util/http';
import { Logger } from '../util/logger';
import {
  AuthError,
  AuthRejectedError,
  TransportError,
  isAppError
} from '../util/error-handler';

export type FairlandTransportOptions = Pick<
  EngineConfig,
  'baseUrl' | 'groupId' | 'requestTimeoutMs' | 'sessionTtlMs' | 'minRequestIntervalMs'
>;

/**
 * Fairland IoT cloud transport
 *
 * REST/JSON calls against the vendor API. Every response arrives in an
 * envelope `{code, msg, data}` where `code` 200000 means success.
 */
export class FairlandTransport extends BaseApiService implements CloudTransport {
  private readonly http: HttpClient;
  // Running-mode codes per device, learned from the last data point list
  private readonly presetCodes = new Map<string, Map<string, number>>();

  constructor(
    private readonly options: FairlandTransportOptions,
    logger: Logger,
    httpClient?: HttpClient
  ) {
    super('Fairland', logger, options.minRequestIntervalMs);
    this.http = httpClient ?? createHttpClient({
      baseURL: options.baseUrl,
      logger,
      timeoutMs: options.requestTimeoutMs,
      headers: {
        terminal: FAIRLAND_API.TERMINAL,
        'User-Agent': FAIRLAND_API.USER_AGENT,
        Accept: 'application/json;charset=UTF-8'
      }
    });
  }

  async login(credential: Credential): Promise<Session> {
    this.logApiCall('POST', FAIRLAND_API.LOGIN, { accountName: `${credential.username.substring(0, 3)}...` });

    let payload: unknown;
    try {
      payload = await this.guardedRequest(() => this.http.post(FAIRLAND_API.LOGIN, {
        body: {
          phoneCode: credential.phoneCode,
          accountName: credential.username,
          password: credential.password,
          countryCode: credential.countryCode,
          randStr: '',
          ticket: ''
        }
      }));
    } catch (error) {
      if (error instanceof AuthRejectedError) {
        throw new AuthError(`login rejected with HTTP ${error.status ?? 'error'}`, error);
      }
      throw error;
    }

    if (!isRecord(payload)) {
      throw new TransportError('Unexpected login response', 'fatal', { context: { endpoint: FAIRLAND_API.LOGIN } });
    }

    if (payload.code !== FAIRLAND_API.SUCCESS_CODE) {
      const message = readString(payload, 'msg') ?? 'unknown error';
      throw new AuthError(`${message} (code ${String(payload.code)})`);
    }

    const data = payload.data;
    const accessToken = isRecord(data) ? readString(data, 'authorization') : null;
    if (!isRecord(data) || !accessToken) {
      throw new TransportError('Login response carries no authorization token', 'fatal', {
        context: { endpoint: FAIRLAND_API.LOGIN }
      });
    }

    this.logger.log('Fairland login successful');

    return {
      accessToken,
      expiresAt: DateTime.now().plus({ milliseconds: this.options.sessionTtlMs }).toMillis(),
      refreshToken: null,
      userId: readString(data, 'userId')
    };
  }

  /**
   * The vendor issues no refresh token; a refresh is a fresh login
   */
  async refresh(_session: Session, credential: Credential): Promise<Session> {
    return this.login(credential);
  }

  async listDevices(session: Session): Promise<Device[]> {
    const groupIds = this.options.groupId !== null
      ? [this.options.groupId]
      : await this.listGroupIds(session);

    const devices: Device[] = [];
    for (const groupId of groupIds) {
      const data = await this.post(session, FAIRLAND_API.GROUP_DEVICES, { deviceGroupId: groupId, shareId: null });
      const bound = isRecord(data) ? data.bindDeviceInfos : undefined;
      if (!Array.isArray(bound)) {
        throw new TransportError('Group device response has no device list', 'fatal', { context: { groupId } });
      }

      for (const entry of bound) {
        if (!isRecord(entry) || entry.categoryCode !== FAIRLAND_API.HEAT_PUMP_CATEGORY) continue;
        const id = readString(entry, 'id');
        if (id === null) continue;

        const points = await this.fetchDataPoints(session, id);
        devices.push({
          id,
          name: readString(entry, 'deviceName') ?? id,
          model: readString(entry, 'deviceName') ?? FAIRLAND_API.HEAT_PUMP_CATEGORY,
          groupId,
          firmwareVersion: readString(entry, 'version'),
          serialNumber: readString(entry, 'sn'),
          capabilities: decodeCapabilities(points)
        });
      }
    }

    this.logger.log(`Fairland devices retrieved: ${devices.length} heat pumps found`);
    return devices;
  }

  /**
   * Fetch every device separately. A session rejection aborts the batch so the
   * cloud client can re-authenticate; any other failure stays with its device.
   */
  async getStates(session: Session, deviceIds: string[]): Promise<Record<string, DeviceFetchResult>> {
    const results: Record<string, DeviceFetchResult> = {};

    for (const deviceId of deviceIds) {
      try {
        const points = await this.fetchDataPoints(session, deviceId);
        results[deviceId] = { ok: true, snapshot: decodeSnapshot(points) };
      } catch (error) {
        if (error instanceof AuthRejectedError) {
          throw error;
        }
        results[deviceId] = { ok: false, error: this.asTransportError(error, { deviceId }) };
      }
    }

    return results;
  }

  async sendCommand(session: Session, deviceId: string, field: CommandField, value: CommandValue): Promise<void> {
    let presetCodes = this.presetCodes.get(deviceId);
    if (field === 'presetMode' && !presetCodes) {
      await this.fetchDataPoints(session, deviceId);
      presetCodes = this.presetCodes.get(deviceId);
    }

    const write = encodeCommand(field, value, presetCodes ?? new Map());
    this.logger.log(`Setting ${field} for device ${deviceId} to ${String(value)} (dp ${write.dpId})`);

    await this.post(session, FAIRLAND_API.SET_PROPERTY, {
      deviceId,
      dpIdValues: [{ type: '', dpId: write.dpId, value: write.value }]
    });
  }

  private async listGroupIds(session: Session): Promise<string[]> {
    const data = await this.post(session, FAIRLAND_API.GROUPS, { needDeviceCount: true });
    if (!Array.isArray(data)) {
      throw new TransportError('Group response is not a list', 'fatal', { context: { endpoint: FAIRLAND_API.GROUPS } });
    }

    const ids: string[] = [];
    for (const group of data) {
      const id = isRecord(group) ? readString(group, 'id') : null;
      if (id !== null) ids.push(id);
    }
    return ids;
  }

  private async fetchDataPoints(session: Session, deviceId: string): Promise<DataPoint[]> {
    const data = await this.post(session, FAIRLAND_API.DATA_POINTS, { deviceId });
    const points = parseDataPoints(data);

    const codes = new Map<string, number>();
    for (const [code, name] of presetModeTable(points)) {
      codes.set(name, code);
    }
    this.presetCodes.set(deviceId, codes);

    return points;
  }

  /**
   * Authenticated POST returning the envelope's `data` member
   */
  private async post(session: Session, endpoint: string, body: Record<string, unknown>): Promise<unknown> {
    this.logApiCall('POST', endpoint, body);

    const payload = await this.guardedRequest(() => this.http.post(endpoint, {
      body,
      headers: { Authorization: session.accessToken }
    }));

    if (!isRecord(payload)) {
      throw new TransportError(`Unexpected response from ${endpoint}`, 'fatal', { context: { endpoint } });
    }
    if (payload.code !== FAIRLAND_API.SUCCESS_CODE) {
      throw new TransportError(
        `${endpoint} failed: ${readString(payload, 'msg') ?? 'unknown error'} (code ${String(payload.code)})`,
        'fatal',
        { context: { endpoint, code: payload.code } }
      );
    }

    return payload.data;
  }

  private asTransportError(error: unknown, context: Record<string, unknown>): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const appError = this.createApiError(error, context);
    return new TransportError(appError.message, isAppError(error) && error.recoverable ? 'retryable' : 'fatal', {
      originalError: error,
      context: appError.context
    });
  }
}
