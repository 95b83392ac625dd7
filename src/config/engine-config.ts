/**
 * Engine configuration
 *
 * Defaults for every tunable, applied when the host leaves a value out.
 */

import { Credential } from '../types';
import { ENGINE_DEFAULTS, FAIRLAND_API } from '../constants/fairland-api';
import { validateNumber, validateString } from '../util/validation';

export interface EngineConfig {
  credential: Credential;
  /** Restrict discovery to one device group; all groups when null */
  groupId: string | null;
  baseUrl: string;
  pollIntervalMs: number;
  commandTimeoutMs: number;
  maxCommandAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  sessionSafetyMarginMs: number;
  sessionTtlMs: number;
  discoveryEveryCycles: number;
  confirmationPollDelayMs: number;
  minRequestIntervalMs: number;
}

export interface EngineConfigInput extends Partial<Omit<EngineConfig, 'credential'>> {
  credential: {
    username: string;
    password: string;
    countryCode?: string;
    phoneCode?: string;
  };
}

/**
 * Fill in defaults and validate ranges
 * @throws ValidationError on a missing credential or an out-of-range value
 */
export function resolveEngineConfig(input: EngineConfigInput): EngineConfig {
  const username = validateString(input.credential.username, 'username', { minLength: 1 });
  const password = validateString(input.credential.password, 'password', { minLength: 1 });

  const pollIntervalMs = validateNumber(
    input.pollIntervalMs ?? ENGINE_DEFAULTS.POLL_INTERVAL_MS,
    'pollIntervalMs',
    { min: 1, integer: true }
  );

  const retryBaseDelayMs = validateNumber(
    input.retryBaseDelayMs ?? ENGINE_DEFAULTS.RETRY_BASE_DELAY_MS,
    'retryBaseDelayMs',
    { min: 0 }
  );

  return {
    credential: {
      username,
      password,
      countryCode: input.credential.countryCode ?? FAIRLAND_API.DEFAULT_COUNTRY_CODE,
      phoneCode: input.credential.phoneCode ?? FAIRLAND_API.DEFAULT_PHONE_CODE
    },
    groupId: input.groupId ?? null,
    baseUrl: validateString(input.baseUrl ?? FAIRLAND_API.BASE_URL, 'baseUrl', { pattern: /^https?:\/\// }),
    pollIntervalMs,
    commandTimeoutMs: validateNumber(
      input.commandTimeoutMs ?? pollIntervalMs * ENGINE_DEFAULTS.COMMAND_TIMEOUT_POLL_MULTIPLE,
      'commandTimeoutMs',
      { min: 1 }
    ),
    maxCommandAttempts: validateNumber(
      input.maxCommandAttempts ?? ENGINE_DEFAULTS.MAX_COMMAND_ATTEMPTS,
      'maxCommandAttempts',
      { min: 1, max: 10, integer: true }
    ),
    retryBaseDelayMs,
    retryMaxDelayMs: validateNumber(
      input.retryMaxDelayMs ?? Math.max(ENGINE_DEFAULTS.RETRY_MAX_DELAY_MS, retryBaseDelayMs),
      'retryMaxDelayMs',
      { min: retryBaseDelayMs }
    ),
    requestTimeoutMs: validateNumber(
      input.requestTimeoutMs ?? ENGINE_DEFAULTS.REQUEST_TIMEOUT_MS,
      'requestTimeoutMs',
      { min: 1 }
    ),
    sessionSafetyMarginMs: validateNumber(
      input.sessionSafetyMarginMs ?? ENGINE_DEFAULTS.SESSION_SAFETY_MARGIN_MS,
      'sessionSafetyMarginMs',
      { min: 0 }
    ),
    sessionTtlMs: validateNumber(
      input.sessionTtlMs ?? ENGINE_DEFAULTS.SESSION_TTL_MS,
      'sessionTtlMs',
      { min: 1 }
    ),
    discoveryEveryCycles: validateNumber(
      input.discoveryEveryCycles ?? ENGINE_DEFAULTS.DISCOVERY_EVERY_CYCLES,
      'discoveryEveryCycles',
      { min: 1, integer: true }
    ),
    confirmationPollDelayMs: validateNumber(
      input.confirmationPollDelayMs ?? ENGINE_DEFAULTS.CONFIRMATION_POLL_DELAY_MS,
      'confirmationPollDelayMs',
      { min: 0 }
    ),
    minRequestIntervalMs: validateNumber(
      input.minRequestIntervalMs ?? ENGINE_DEFAULTS.MIN_REQUEST_INTERVAL_MS,
      'minRequestIntervalMs',
      { min: 0 }
    )
  };
}
