import type { AppError, TransportError } from '../util/error-handler';

export type HvacMode = 'auto' | 'heat' | 'cool';

export const HVAC_MODES: readonly HvacMode[] = ['auto', 'heat', 'cool'];

/**
 * Account credential, supplied once at setup
 */
export interface Credential {
  readonly username: string;
  readonly password: string;
  readonly countryCode: string;
  readonly phoneCode: string;
}

export interface Session {
  accessToken: string;
  /** Epoch milliseconds */
  expiresAt: number;
  refreshToken: string | null;
  userId: string | null;
}

export interface NumericRange {
  min: number;
  max: number;
  step: number;
}

/**
 * Installer settings of the heat pump, each carried by its own data point
 */
export type ParameterField =
  | 'waterPumpMode'
  | 'waterPumpTime'
  | 'defrostInterval'
  | 'defrostStartTemperature'
  | 'defrostRunningTime'
  | 'defrostQuitTemperature';

export const PARAMETER_FIELDS: readonly ParameterField[] = [
  'waterPumpMode',
  'waterPumpTime',
  'defrostInterval',
  'defrostStartTemperature',
  'defrostRunningTime',
  'defrostQuitTemperature'
];

/**
 * Read-only refrigeration circuit measurements
 */
export type ReadingField =
  | 'exhaustTemperature'
  | 'outerCoilTemperature'
  | 'gasReturnTemperature'
  | 'innerCoilTemperature'
  | 'coolingPlateTemperature'
  | 'expansionValveOpening'
  | 'fanSpeed';

export const READING_FIELDS: readonly ReadingField[] = [
  'exhaustTemperature',
  'outerCoilTemperature',
  'gasReturnTemperature',
  'innerCoilTemperature',
  'coolingPlateTemperature',
  'expansionValveOpening',
  'fanSpeed'
];

/**
 * Which operational parameters a device accepts commands for
 */
export interface DeviceCapabilities {
  power: boolean;
  /** Settable HVAC modes, empty when the mode is read-only */
  modes: HvacMode[];
  targetTemperature: NumericRange | null;
  /** Running-mode names, empty when presets are not supported */
  presetModes: string[];
  /** Writable installer settings and their accepted range */
  parameters: Partial<Record<ParameterField, NumericRange>>;
}

export interface Device {
  id: string;
  name: string;
  model: string;
  groupId: string | null;
  firmwareVersion: string | null;
  serialNumber: string | null;
  capabilities: DeviceCapabilities;
}

/**
 * Operational parameters of one heat pump. `null` means the device did not report the value.
 */
export interface DeviceSnapshot {
  power: boolean | null;
  mode: HvacMode | null;
  presetMode: string | null;
  targetTemperature: number | null;
  /** Measured (inlet) water temperature in °C */
  currentTemperature: number | null;
  outletTemperature: number | null;
  ambientTemperature: number | null;
  /** Instantaneous draw in kW */
  powerDraw: number | null;
  runningPercentage: number | null;
  operating: boolean | null;
  faults: string[];
  exhaustTemperature: number | null;
  outerCoilTemperature: number | null;
  gasReturnTemperature: number | null;
  innerCoilTemperature: number | null;
  coolingPlateTemperature: number | null;
  expansionValveOpening: number | null;
  /** DC fan speed in r/min */
  fanSpeed: number | null;
  waterPumpMode: number | null;
  /** Minutes */
  waterPumpTime: number | null;
  /** Minutes */
  defrostInterval: number | null;
  defrostStartTemperature: number | null;
  /** Minutes */
  defrostRunningTime: number | null;
  defrostQuitTemperature: number | null;
  /** Service values keyed by name, present only when reported */
  diagnostics: Record<string, number>;
}

/**
 * The commandable subset of a snapshot and the value type each one takes
 */
export interface ControlValues extends Record<ParameterField, number> {
  power: boolean;
  mode: HvacMode;
  targetTemperature: number;
  presetMode: string;
}

export type CommandField = keyof ControlValues;

export type CommandValue = ControlValues[CommandField];

export const COMMAND_FIELDS: readonly CommandField[] = ['power', 'mode', 'targetTemperature', 'presetMode', ...PARAMETER_FIELDS];

/**
 * One field paired with a value of its own type
 */
export type FieldUpdate = { [F in CommandField]: { field: F; value: ControlValues[F] } }[CommandField];

export type StateSource = 'confirmed' | 'optimistic';

export interface DeviceState {
  deviceId: string;
  /** Visible values: the confirmed baseline overlaid with pending optimistic fields */
  values: DeviceSnapshot;
  revision: number;
  source: StateSource;
  /** Field to id of the pending command shadowing it */
  pendingCommands: Partial<Record<CommandField, string>>;
  unavailable: boolean;
  unavailableReason: string | null;
  confirmedAt: number | null;
  updatedAt: number;
}

export type StateChangeKind = 'discovered' | 'confirmed' | 'optimistic' | 'resolved' | 'availability';

export type StateListener = (state: DeviceState, kind: StateChangeKind) => void;

export type CommandStatus = 'pending' | 'confirmed' | 'failed' | 'expired';

export type TerminalCommandStatus = Exclude<CommandStatus, 'pending'>;

export interface CommandOutcome {
  commandId: string;
  deviceId: string;
  field: CommandField;
  value: CommandValue;
  status: TerminalCommandStatus;
  attempts: number;
  error: AppError | null;
  settledAt: number;
}

export interface CommandHandle {
  readonly id: string;
  readonly deviceId: string;
  readonly field: CommandField;
  readonly value: CommandValue;
  readonly createdAt: number;
  readonly status: CommandStatus;
  /** Resolves once with the terminal outcome; never rejects */
  readonly completion: Promise<CommandOutcome>;
}

export type CommandListener = (outcome: CommandOutcome) => void;

export type DeviceFetchResult =
  | { ok: true; snapshot: DeviceSnapshot }
  | { ok: false; error: TransportError };

/**
 * Request/response contract with the vendor cloud. Implementations throw
 * `AuthError` for refused logins, `AuthRejectedError` when a session is
 * rejected and `TransportError` for everything else.
 */
export interface CloudTransport {
  login(credential: Credential): Promise<Session>;
  refresh(session: Session, credential: Credential): Promise<Session>;
  listDevices(session: Session): Promise<Device[]>;
  getStates(session: Session, deviceIds: string[]): Promise<Record<string, DeviceFetchResult>>;
  sendCommand(session: Session, deviceId: string, field: CommandField, value: CommandValue): Promise<void>;
}

export function emptySnapshot(): DeviceSnapshot {
  return {
    power: null,
    mode: null,
    presetMode: null,
    targetTemperature: null,
    currentTemperature: null,
    outletTemperature: null,
    ambientTemperature: null,
    powerDraw: null,
    runningPercentage: null,
    operating: null,
    faults: [],
    exhaustTemperature: null,
    outerCoilTemperature: null,
    gasReturnTemperature: null,
    innerCoilTemperature: null,
    coolingPlateTemperature: null,
    expansionValveOpening: null,
    fanSpeed: null,
    waterPumpMode: null,
    waterPumpTime: null,
    defrostInterval: null,
    defrostStartTemperature: null,
    defrostRunningTime: null,
    defrostQuitTemperature: null,
    diagnostics: {}
  };
}
