/**
 * Fairland cloud API constants
 *
 * Endpoints, data point ids and timing defaults used by the transport and
 * the synchronization engine.
 */

import type { NumericRange, ParameterField, ReadingField } from '../types';

export const FAIRLAND_API = {
  BASE_URL: 'https://api-eu.fairlandiot.com/',

  LOGIN: 'fyld-user-api/user/loginByPassword',
  GROUPS: 'fyld-device-api/deviceGroupApi/allGroupInfo',
  GROUP_DEVICES: 'fyld-device-api/deviceApi/deviceAllGroupInfo',
  DATA_POINTS: 'fyld-device-api/deviceDataPointApi/deviceDataPointInfo',
  SET_PROPERTY: 'fyld-device-api/devicePropertySetApi/set',

  /**
   * Envelope code the API returns for a successful call
   */
  SUCCESS_CODE: 200000,

  /**
   * Client identification headers the mobile app sends
   */
  TERMINAL: '2',
  USER_AGENT: 'Dart/3.5 (dart:io)',

  DEFAULT_COUNTRY_CODE: 'DE',
  DEFAULT_PHONE_CODE: '49',

  HEAT_PUMP_CATEGORY: 'heatPump',
} as const;

/**
 * Data point ids of a Fairland pool heat pump
 */
export const DATA_POINTS = {
  POWER: '101',
  RUNNING_MODE: '102',
  INLET_TEMPERATURE: '103',
  RUNNING_PERCENTAGE: '105',
  HVAC_MODE: '106',
  /** Set point; written here rather than to the inlet reading (103) so the confirming poll reads the point it wrote */
  TARGET_TEMPERATURE: '107',
  LOWER_TEMPERATURE_LIMIT: '108',
  UPPER_TEMPERATURE_LIMIT: '109',
  POWER_DRAW: '112',
  OPERATING_STATUS: '113',
  OUTLET_TEMPERATURE: '129',
  AMBIENT_TEMPERATURE: '130',
} as const;

export const READING_DATA_POINTS = {
  exhaustTemperature: '131',
  outerCoilTemperature: '132',
  gasReturnTemperature: '133',
  innerCoilTemperature: '134',
  coolingPlateTemperature: '135',
  expansionValveOpening: '136',
  fanSpeed: '137',
} as const satisfies Record<ReadingField, string>;

/**
 * Installer settings. The range applies unless the data point's dpProperty
 * states its own min, max or step.
 */
export const PARAMETER_DATA_POINTS = {
  waterPumpMode: { dpId: '116', min: 0, max: 2, step: 1 },
  waterPumpTime: { dpId: '117', min: 10, max: 120, step: 5 },
  defrostInterval: { dpId: '118', min: 30, max: 90, step: 1 },
  defrostStartTemperature: { dpId: '119', min: -30, max: 250, step: 1 },
  defrostRunningTime: { dpId: '120', min: 1, max: 12, step: 1 },
  defrostQuitTemperature: { dpId: '121', min: 8, max: 100, step: 1 },
} as const satisfies Record<ParameterField, NumericRange & { dpId: string }>;

// Service values, by data point id
export const DIAGNOSTIC_DATA_POINTS: Readonly<Record<string, string>> = {
  '108': 'lowerTemperatureLimit',
  '109': 'upperTemperatureLimit',
  '114': 'refrigerationFunction',
  '115': 'overclockingFunction',
  '122': 'compressorSpeedControl',
  '123': 'eevSuperheatHeating',
  '124': 'eevSuperheatCooling',
  '125': 'eevControlMode',
  '126': 'eevManualOpeningHeating',
  '127': 'eevManualOpeningCooling',
  '128': 'powerOffMemory',
};

/**
 * HVAC mode values as encoded in data point 106
 */
export const HVAC_MODE_CODES = {
  auto: 0,
  heat: 1,
  cool: 2,
} as const;

/**
 * Power draw is reported in W; the value is divided by 10^scale to give kW
 * unless the data point states its own scale
 */
export const POWER_DRAW_DEFAULT_SCALE = 3;

/**
 * Target temperature bounds when the device does not report its own limits
 */
export const TARGET_TEMPERATURE_DEFAULTS = {
  MIN: 8,
  MAX: 40,
  STEP: 1,
} as const;

export const FAULT_DATA_POINT_PATTERN = /fault|error|alarm/i;

// Engine timing defaults
export const ENGINE_DEFAULTS = {
  POLL_INTERVAL_MS: 30_000,
  COMMAND_TIMEOUT_POLL_MULTIPLE: 3,
  MAX_COMMAND_ATTEMPTS: 3,
  RETRY_BASE_DELAY_MS: 1_000,
  RETRY_MAX_DELAY_MS: 10_000,
  REQUEST_TIMEOUT_MS: 10_000,
  SESSION_SAFETY_MARGIN_MS: 60_000,
  SESSION_TTL_MS: 60 * 60 * 1000, // 1 hour
  DISCOVERY_EVERY_CYCLES: 20,
  CONFIRMATION_POLL_DELAY_MS: 5_000,
  MIN_REQUEST_INTERVAL_MS: 250,
  MAX_THROTTLE_WAIT_MS: 60_000,
} as const;

// Circuit breaker configuration for the cloud transport
export const CIRCUIT_BREAKER = {
  FAILURE_THRESHOLD: 5,
  RESET_TIMEOUT: 30_000,
  MAX_RESET_TIMEOUT: 10 * 60 * 1000, // 10 minutes
  HALF_OPEN_SUCCESS_THRESHOLD: 1,
} as const;
