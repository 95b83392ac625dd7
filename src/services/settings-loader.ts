import { Logger } from '../util/logger';
import { EngineConfig, EngineConfigInput, resolveEngineConfig } from '../config/engine-config';
import { ENGINE_DEFAULTS, FAIRLAND_API } from '../constants/fairland-api';

/**
 * Key/value settings store the host keeps its configuration in
 */
export interface SettingsSource {
  get(key: string): unknown;
}

/**
 * Read settings from environment variables: `poll_interval_ms` is looked up
 * as `FAIRLAND_POLL_INTERVAL_MS`. Blank variables count as unset.
 */
export function createEnvSettingsSource(env: NodeJS.ProcessEnv = process.env, prefix: string = 'FAIRLAND_'): SettingsSource {
  return {
    get(key: string): unknown {
      const raw = env[`${prefix}${key.toUpperCase()}`];
      return raw === undefined || raw.trim() === '' ? undefined : raw;
    }
  };
}

/**
 * SettingsLoader
 *
 * Type-safe access to host settings with validation and defaults.
 */
export class SettingsLoader {
  constructor(
    private readonly settings: SettingsSource,
    private readonly logger: Logger
  ) { }

  /**
   * Load every engine setting and resolve it into an EngineConfig
   * @throws ValidationError when the credential is missing
   */
  loadEngineConfig(): EngineConfig {
    const pollIntervalMs = this.getNumber('poll_interval_ms', ENGINE_DEFAULTS.POLL_INTERVAL_MS, { min: 5_000, max: 3_600_000 });
    const groupId = this.getString('group_id', '');

    const input: EngineConfigInput = {
      credential: {
        username: this.getString('username', ''),
        password: this.getString('password', ''),
        countryCode: this.getString('country_code', FAIRLAND_API.DEFAULT_COUNTRY_CODE),
        phoneCode: this.getString('phone_code', FAIRLAND_API.DEFAULT_PHONE_CODE)
      },
      groupId: groupId.length > 0 ? groupId : null,
      baseUrl: this.getString('base_url', FAIRLAND_API.BASE_URL),
      pollIntervalMs,
      commandTimeoutMs: this.getNumber(
        'command_timeout_ms',
        pollIntervalMs * ENGINE_DEFAULTS.COMMAND_TIMEOUT_POLL_MULTIPLE,
        { min: 1_000 }
      ),
      maxCommandAttempts: this.getNumber('max_command_attempts', ENGINE_DEFAULTS.MAX_COMMAND_ATTEMPTS, { min: 1, max: 10 }),
      retryBaseDelayMs: this.getNumber('retry_base_delay_ms', ENGINE_DEFAULTS.RETRY_BASE_DELAY_MS, { min: 0, max: 60_000 }),
      requestTimeoutMs: this.getNumber('request_timeout_ms', ENGINE_DEFAULTS.REQUEST_TIMEOUT_MS, { min: 1_000, max: 120_000 }),
      discoveryEveryCycles: this.getNumber('discovery_every_cycles', ENGINE_DEFAULTS.DISCOVERY_EVERY_CYCLES, { min: 1 })
    };

    this.logger.log(
      `Engine settings loaded - Poll: ${pollIntervalMs}ms, Command timeout: ${input.commandTimeoutMs}ms, Attempts: ${input.maxCommandAttempts}, Group: ${input.groupId ?? 'all'}`
    );

    return resolveEngineConfig(input);
  }

  /**
   * Report a setting whose stored type does not match what the engine expects
   */
  private mismatch<T>(key: string, value: unknown, defaultValue: T): T {
    if (value !== null && value !== undefined) {
      this.logger.log(`Setting '${key}' has unexpected type: expected ${typeof defaultValue}, got ${typeof value}. Using default.`);
    }
    return defaultValue;
  }

  /**
   * Get number setting with range validation. Numeric strings are accepted.
   */
  getNumber(
    key: string,
    defaultValue: number,
    options?: { min?: number; max?: number }
  ): number {
    const raw = this.settings.get(key);
    let value: number;
    if (typeof raw === 'number') {
      value = raw;
    } else if (typeof raw === 'string' && /^\s*-?\d+(\.\d+)?\s*$/.test(raw)) {
      value = Number(raw);
    } else {
      return this.mismatch(key, raw, defaultValue);
    }

    if (!Number.isFinite(value)) {
      return defaultValue;
    }

    if (options) {
      if (options.min !== undefined && value < options.min) {
        this.logger.log(`Setting '${key}' value ${value} below minimum ${options.min}. Using default.`);
        return defaultValue;
      }
      if (options.max !== undefined && value > options.max) {
        this.logger.log(`Setting '${key}' value ${value} above maximum ${options.max}. Using default.`);
        return defaultValue;
      }
    }

    return value;
  }

  getString(key: string, defaultValue: string): string {
    const raw = this.settings.get(key);
    return typeof raw === 'string' ? raw : this.mismatch(key, raw, defaultValue);
  }
}
