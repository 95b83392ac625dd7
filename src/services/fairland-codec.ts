/**
 * Fairland data point codec
 *
 * Translates the vendor's data point lists into snapshots and capabilities,
 * and commands into data point writes.
 */

import {
  CommandField,
  CommandValue,
  DeviceCapabilities,
  DeviceSnapshot,
  HVAC_MODES,
  HvacMode,
  PARAMETER_FIELDS,
  READING_FIELDS,
  emptySnapshot
} from '../types';
import {
  DATA_POINTS,
  DIAGNOSTIC_DATA_POINTS,
  FAULT_DATA_POINT_PATTERN,
  HVAC_MODE_CODES,
  PARAMETER_DATA_POINTS,
  POWER_DRAW_DEFAULT_SCALE,
  READING_DATA_POINTS,
  TARGET_TEMPERATURE_DEFAULTS
} from '../constants/fairland-api';
import { TransportError, UnsupportedOperationError } from '../util/error-handler';

export interface DataPoint {
  dpId: string;
  dpValue: unknown;
  dpMode: string | null;
  dpProperty: Record<string, unknown> | null;
  dpCode: string | null;
  dpName: string | null;
}

export interface DataPointWrite {
  dpId: string;
  value: boolean | number;
}

const KNOWN_DATA_POINTS = new Set<string>([
  ...Object.values(DATA_POINTS),
  ...Object.values(READING_DATA_POINTS),
  ...PARAMETER_FIELDS.map(field => PARAMETER_DATA_POINTS[field].dpId),
  ...Object.keys(DIAGNOSTIC_DATA_POINTS)
]);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (normalized === 'true' || normalized === '1') return true;
    if (normalized === 'false' || normalized === '0') return false;
  }
  return null;
}

/**
 * dpProperty arrives as a JSON string; unparsable properties are ignored
 */
function parseProperty(value: unknown): Record<string, unknown> | null {
  if (isRecord(value)) return value;
  if (typeof value !== 'string' || value.trim() === '') return null;
  try {
    const parsed: unknown = JSON.parse(value);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Parse the `data` member of a deviceDataPointInfo response
 * @throws TransportError (fatal) when the payload is not a list
 */
export function parseDataPoints(data: unknown): DataPoint[] {
  if (!Array.isArray(data)) {
    throw new TransportError('Data point response is not a list', 'fatal');
  }

  const points: DataPoint[] = [];
  for (const item of data) {
    if (!isRecord(item)) continue;
    const dpId = readString(item, 'dpId');
    if (dpId === null) continue;
    points.push({
      dpId,
      dpValue: item.dpValue,
      dpMode: readString(item, 'dpMode'),
      dpProperty: parseProperty(item.dpProperty),
      dpCode: readString(item, 'dpCode'),
      dpName: readString(item, 'dpName')
    });
  }
  return points;
}

function indexPoints(points: DataPoint[]): Map<string, DataPoint> {
  return new Map(points.map(point => [point.dpId, point]));
}

/**
 * Running-mode names keyed by their numeric code, from dpProperty of data point 102
 */
export function presetModeTable(points: DataPoint[]): Map<number, string> {
  const table = new Map<number, string>();
  const property = indexPoints(points).get(DATA_POINTS.RUNNING_MODE)?.dpProperty;
  if (!property) return table;

  for (const [code, name] of Object.entries(property)) {
    const numeric = toNumber(code);
    if (numeric !== null && typeof name === 'string') {
      table.set(numeric, name);
    }
  }
  return table;
}

function hvacModeFromCode(value: unknown): HvacMode | null {
  const code = toNumber(value);
  return HVAC_MODES.find(mode => HVAC_MODE_CODES[mode] === code) ?? null;
}

function powerDraw(point: DataPoint | undefined): number | null {
  if (!point) return null;
  const watts = toNumber(point.dpValue);
  if (watts === null) return null;
  const scale = toNumber(point.dpProperty?.scale) ?? POWER_DRAW_DEFAULT_SCALE;
  return watts / Math.pow(10, scale);
}

function faultFlags(points: DataPoint[]): string[] {
  const faults: string[] = [];
  for (const point of points) {
    if (KNOWN_DATA_POINTS.has(point.dpId)) continue;
    const label = point.dpCode ?? point.dpName;
    if (label === null || !FAULT_DATA_POINT_PATTERN.test(label)) continue;
    if (toBoolean(point.dpValue) === true) {
      faults.push(label);
    }
  }
  return faults;
}

export function decodeSnapshot(points: DataPoint[]): DeviceSnapshot {
  const byId = indexPoints(points);
  const value = (id: string): unknown => byId.get(id)?.dpValue;
  const snapshot = emptySnapshot();

  snapshot.power = toBoolean(value(DATA_POINTS.POWER));
  snapshot.mode = hvacModeFromCode(value(DATA_POINTS.HVAC_MODE));

  const presetCode = toNumber(value(DATA_POINTS.RUNNING_MODE));
  snapshot.presetMode = presetCode === null ? null : presetModeTable(points).get(presetCode) ?? null;

  snapshot.targetTemperature = toNumber(value(DATA_POINTS.TARGET_TEMPERATURE));
  snapshot.currentTemperature = toNumber(value(DATA_POINTS.INLET_TEMPERATURE));
  snapshot.outletTemperature = toNumber(value(DATA_POINTS.OUTLET_TEMPERATURE));
  snapshot.ambientTemperature = toNumber(value(DATA_POINTS.AMBIENT_TEMPERATURE));
  snapshot.runningPercentage = toNumber(value(DATA_POINTS.RUNNING_PERCENTAGE));
  snapshot.powerDraw = powerDraw(byId.get(DATA_POINTS.POWER_DRAW));
  snapshot.operating = toBoolean(value(DATA_POINTS.OPERATING_STATUS));
  snapshot.faults = faultFlags(points);

  for (const field of READING_FIELDS) {
    snapshot[field] = toNumber(value(READING_DATA_POINTS[field]));
  }
  for (const field of PARAMETER_FIELDS) {
    snapshot[field] = toNumber(value(PARAMETER_DATA_POINTS[field].dpId));
  }
  for (const [dpId, name] of Object.entries(DIAGNOSTIC_DATA_POINTS)) {
    const raw = value(dpId);
    const reading = typeof raw === 'boolean' ? Number(raw) : toNumber(raw);
    if (reading !== null) {
      snapshot.diagnostics[name] = reading;
    }
  }

  return snapshot;
}

/**
 * Climate controls are offered unless their data point is explicitly
 * read-only; installer settings only when their data point is present and
 * marked `rw`.
 */
export function decodeCapabilities(points: DataPoint[]): DeviceCapabilities {
  const byId = indexPoints(points);
  const offered = (id: string): boolean => byId.get(id)?.dpMode !== 'ro';

  let targetTemperature: DeviceCapabilities['targetTemperature'] = null;
  if (offered(DATA_POINTS.TARGET_TEMPERATURE)) {
    const property = byId.get(DATA_POINTS.TARGET_TEMPERATURE)?.dpProperty;
    targetTemperature = {
      min: toNumber(byId.get(DATA_POINTS.LOWER_TEMPERATURE_LIMIT)?.dpValue)
        ?? toNumber(property?.min)
        ?? TARGET_TEMPERATURE_DEFAULTS.MIN,
      max: toNumber(byId.get(DATA_POINTS.UPPER_TEMPERATURE_LIMIT)?.dpValue)
        ?? toNumber(property?.max)
        ?? TARGET_TEMPERATURE_DEFAULTS.MAX,
      step: toNumber(property?.step) ?? TARGET_TEMPERATURE_DEFAULTS.STEP
    };
  }

  const parameters: DeviceCapabilities['parameters'] = {};
  for (const field of PARAMETER_FIELDS) {
    const definition = PARAMETER_DATA_POINTS[field];
    const point = byId.get(definition.dpId);
    if (point?.dpMode !== 'rw') continue;
    parameters[field] = {
      min: toNumber(point.dpProperty?.min) ?? definition.min,
      max: toNumber(point.dpProperty?.max) ?? definition.max,
      step: toNumber(point.dpProperty?.step) ?? definition.step
    };
  }

  return {
    power: offered(DATA_POINTS.POWER),
    modes: offered(DATA_POINTS.HVAC_MODE) ? [...HVAC_MODES] : [],
    targetTemperature,
    presetModes: offered(DATA_POINTS.RUNNING_MODE) ? [...presetModeTable(points).values()] : [],
    parameters
  };
}

/**
 * Map a command onto the data point write that carries it
 * @param presetCodes Running-mode code per name, needed for `presetMode`
 */
export function encodeCommand(
  field: CommandField,
  value: CommandValue,
  presetCodes: Map<string, number>
): DataPointWrite {
  switch (field) {
    case 'power':
      if (typeof value === 'boolean') {
        return { dpId: DATA_POINTS.POWER, value };
      }
      break;
    case 'mode': {
      const mode = HVAC_MODES.find(candidate => candidate === value);
      if (mode) {
        return { dpId: DATA_POINTS.HVAC_MODE, value: HVAC_MODE_CODES[mode] };
      }
      break;
    }
    case 'targetTemperature':
      if (typeof value === 'number') {
        return { dpId: DATA_POINTS.TARGET_TEMPERATURE, value };
      }
      break;
    case 'presetMode': {
      const code = typeof value === 'string' ? presetCodes.get(value) : undefined;
      if (code !== undefined) {
        return { dpId: DATA_POINTS.RUNNING_MODE, value: code };
      }
      break;
    }
    default:
      if (typeof value === 'number') {
        return { dpId: PARAMETER_DATA_POINTS[field].dpId, value };
      }
  }

  throw new UnsupportedOperationError(`Cannot encode ${field}=${String(value)}`, { field });
}
