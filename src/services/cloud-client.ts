import { CloudTransport, CommandField, CommandValue, Device, DeviceFetchResult, Session } from '../types';
import { SessionManager } from './session-manager';
import { Logger } from '../util/logger';
import { AuthRejectedError, TransportError, isAppError } from '../util/error-handler';
import { withTimeout } from '../util/async';

export interface CloudClientOptions {
  requestTimeoutMs: number;
}

// Upper bound on requests a discovery makes (groups, device lists, data points)
const DISCOVERY_REQUEST_BUDGET = 20;

/**
 * Cloud Client
 *
 * Typed wrapper over the transport. Attaches a session to every call and
 * re-authenticates once when the cloud rejects it. Retryable failures are
 * passed through untouched; retry policy belongs to the caller.
 */
export class CloudClient {
  constructor(
    private readonly transport: CloudTransport,
    private readonly sessions: SessionManager,
    private readonly logger: Logger,
    private readonly options: CloudClientOptions
  ) { }

  listDevices(): Promise<Device[]> {
    return this.withSession('listDevices', DISCOVERY_REQUEST_BUDGET, session => this.transport.listDevices(session));
  }

  getStates(deviceIds: string[]): Promise<Record<string, DeviceFetchResult>> {
    return this.withSession('getStates', Math.max(1, deviceIds.length), session => this.transport.getStates(session, deviceIds));
  }

  sendCommand(deviceId: string, field: CommandField, value: CommandValue): Promise<void> {
    return this.withSession('sendCommand', 2, session => this.transport.sendCommand(session, deviceId, field, value));
  }

  /**
   * @param requests How many transport requests the call may make; scales its deadline
   * @throws AuthError when no session can be established
   * @throws TransportError for every other failure
   */
  private async withSession<T>(operation: string, requests: number, call: (session: Session) => Promise<T>): Promise<T> {
    const timeoutMs = this.options.requestTimeoutMs * requests;
    const session = await this.sessions.acquire();
    try {
      return await this.invoke(operation, timeoutMs, session, call);
    } catch (error) {
      if (!(error instanceof AuthRejectedError)) {
        throw error;
      }

      this.logger.warn(`Session rejected during ${operation}, re-authenticating and retrying once`);
      this.sessions.invalidate(session);
      const fresh = await this.sessions.acquire();

      try {
        return await this.invoke(operation, timeoutMs, fresh, call);
      } catch (retryError) {
        if (retryError instanceof AuthRejectedError) {
          this.sessions.invalidate(fresh);
          throw new TransportError(`${operation} rejected after re-authentication`, 'fatal', {
            status: retryError.status,
            originalError: retryError,
            context: { operation }
          });
        }
        throw retryError;
      }
    }
  }

  private async invoke<T>(
    operation: string,
    timeoutMs: number,
    session: Session,
    call: (session: Session) => Promise<T>
  ): Promise<T> {
    try {
      return await withTimeout(call(session), timeoutMs, operation);
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      throw new TransportError(
        `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        'fatal',
        { originalError: error, context: { operation } }
      );
    }
  }
}
