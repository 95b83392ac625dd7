import { DateTime } from 'luxon';
import { CloudTransport, Credential, Session } from '../types';
import { Logger } from '../util/logger';
import { AuthError, ErrorHandler, isAppError } from '../util/error-handler';

export interface SessionManagerOptions {
  /** A session counts as expired this long before its stated expiry */
  safetyMarginMs: number;
}

export type AuthFailureListener = (error: AuthError) => void;

/**
 * Session Manager
 *
 * Owns the single live session for one credential. Concurrent callers of
 * `acquire` share one login or refresh request.
 */
export class SessionManager {
  private session: Session | null = null;
  private pendingAcquire: Promise<Session> | null = null;
  private lastFailureReason: string | null = null;
  private readonly authFailureListeners = new Set<AuthFailureListener>();
  private readonly errorHandler: ErrorHandler;

  constructor(
    private readonly transport: Pick<CloudTransport, 'login' | 'refresh'>,
    private readonly credential: Credential,
    private readonly logger: Logger,
    private readonly options: SessionManagerOptions
  ) {
    this.errorHandler = new ErrorHandler(logger);
  }

  /**
   * Return the cached session while it is comfortably valid, otherwise log in
   * (or refresh) once on behalf of every waiting caller.
   * @throws AuthError when the vendor refuses the credential
   */
  async acquire(): Promise<Session> {
    if (this.session && this.isValid(this.session)) {
      return this.session;
    }

    if (this.pendingAcquire) {
      this.logger.debug('Session renewal already in flight, waiting for it');
      return this.pendingAcquire;
    }

    this.pendingAcquire = this.renew();
    try {
      return await this.pendingAcquire;
    } finally {
      this.pendingAcquire = null;
    }
  }

  /**
   * Drop the cached session. When `session` is given, only that session is
   * dropped, so a stale rejection cannot discard a newer session.
   */
  invalidate(session?: Session): void {
    if (session && this.session && session.accessToken !== this.session.accessToken) {
      return;
    }
    if (this.session) {
      this.logger.log('Session invalidated');
    }
    this.session = null;
  }

  hasSession(): boolean {
    return this.session !== null && this.isValid(this.session);
  }

  /**
   * Listen for authentication failures. Each distinct failure is reported once.
   * @returns Function that removes the listener
   */
  onAuthFailure(listener: AuthFailureListener): () => void {
    this.authFailureListeners.add(listener);
    return () => {
      this.authFailureListeners.delete(listener);
    };
  }

  private isValid(session: Session): boolean {
    return session.expiresAt - Date.now() > this.options.safetyMarginMs;
  }

  private async renew(): Promise<Session> {
    const previous = this.session;
    this.session = null;

    try {
      let session: Session;
      if (previous?.refreshToken) {
        try {
          session = await this.transport.refresh(previous, this.credential);
        } catch (error) {
          if (!(error instanceof AuthError)) throw error;
          this.logger.warn('Session refresh refused, logging in again', { reason: error.reason });
          session = await this.transport.login(this.credential);
        }
      } else {
        session = await this.transport.login(this.credential);
      }

      this.session = session;
      this.lastFailureReason = null;
      this.logger.info(`Session established, valid until ${DateTime.fromMillis(session.expiresAt).toUTC().toISO()}`);
      return session;
    } catch (error) {
      if (error instanceof AuthError) {
        this.reportAuthFailure(error);
      } else if (!isAppError(error)) {
        this.errorHandler.logError(error, { operation: 'acquireSession' });
      }
      throw error;
    }
  }

  private reportAuthFailure(error: AuthError): void {
    if (this.lastFailureReason === error.reason) {
      this.logger.debug(`Authentication still failing: ${error.reason}`);
      return;
    }
    this.lastFailureReason = error.reason;
    this.errorHandler.logError(error, { operation: 'acquireSession' });

    for (const listener of this.authFailureListeners) {
      try {
        listener(error);
      } catch (listenerError) {
        this.logger.error('Auth failure listener threw', listenerError);
      }
    }
  }
}
