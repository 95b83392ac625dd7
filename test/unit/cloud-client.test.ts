import { CloudClient } from '../../src/services/cloud-client';
import { SessionManager } from '../../src/services/session-manager';
import { Session } from '../../src/types';
import { AuthError, AuthRejectedError, TransportError } from '../../src/util/error-handler';
import { FakeTransport, TEST_CREDENTIAL, createMockLogger } from '../mocks';

describe('CloudClient', () => {
  let transport: FakeTransport;
  let sessions: SessionManager;
  let client: CloudClient;

  beforeEach(() => {
    transport = new FakeTransport();
    const logger = createMockLogger();
    sessions = new SessionManager(transport, TEST_CREDENTIAL, logger, { safetyMarginMs: 60_000 });
    client = new CloudClient(transport, sessions, logger, { requestTimeoutMs: 50 });
  });

  test('attaches the current session to every call', async () => {
    await client.listDevices();
    await client.getStates(['hp-1']);
    await client.sendCommand('hp-1', 'power', false);

    expect(transport.login).toHaveBeenCalledTimes(1);
    expect(transport.listDevices.mock.calls[0][0].accessToken).toBe('token-1');
    expect(transport.getStates).toHaveBeenCalledWith(expect.objectContaining({ accessToken: 'token-1' }), ['hp-1']);
    expect(transport.sendCommand).toHaveBeenCalledWith(expect.objectContaining({ accessToken: 'token-1' }), 'hp-1', 'power', false);
  });

  test('re-authenticates once when the session is rejected', async () => {
    transport.getStates.mockRejectedValueOnce(new AuthRejectedError('HTTP 401 Unauthorized', 401));

    const results = await client.getStates(['hp-1']);

    expect(results['hp-1'].ok).toBe(true);
    expect(transport.login).toHaveBeenCalledTimes(2);
    expect(transport.getStates.mock.calls.map(call => call[0].accessToken)).toEqual(['token-1', 'token-2']);
  });

  test('a second rejection becomes a fatal transport error', async () => {
    transport.sendCommand.mockRejectedValue(new AuthRejectedError('HTTP 403 Forbidden', 403));

    const failure = client.sendCommand('hp-1', 'power', true);

    await expect(failure).rejects.toBeInstanceOf(TransportError);
    await expect(failure).rejects.toMatchObject({
      message: 'sendCommand rejected after re-authentication',
      kind: 'fatal',
      status: 403
    });
    expect(transport.sendCommand).toHaveBeenCalledTimes(2);
    expect(sessions.hasSession()).toBe(false);
  });

  test('a refused re-login surfaces as AuthError', async () => {
    transport.listDevices.mockRejectedValueOnce(new AuthRejectedError('HTTP 401 Unauthorized', 401));
    await sessions.acquire();
    transport.login.mockRejectedValueOnce(new AuthError('Incorrect password'));

    await expect(client.listDevices()).rejects.toBeInstanceOf(AuthError);
  });

  test('retryable failures pass through untouched', async () => {
    const error = new TransportError('HTTP 503 Service Unavailable', 'retryable', { status: 503 });
    transport.sendCommand.mockRejectedValueOnce(error);

    await expect(client.sendCommand('hp-1', 'mode', 'cool')).rejects.toBe(error);
    expect(transport.sendCommand).toHaveBeenCalledTimes(1);
  });

  test('unexpected exceptions are wrapped as fatal transport errors', async () => {
    transport.listDevices.mockRejectedValueOnce(new SyntaxError('Unexpected token < in JSON'));

    await expect(client.listDevices()).rejects.toMatchObject({
      message: 'listDevices failed: Unexpected token < in JSON',
      kind: 'fatal'
    });
  });

  test('a call that outlives its deadline fails as retryable', async () => {
    transport.sendCommand.mockImplementationOnce(() => new Promise<void>(resolve => setTimeout(resolve, 300)));

    await expect(client.sendCommand('hp-1', 'power', false)).rejects.toMatchObject({
      message: 'sendCommand timed out after 100ms',
      kind: 'retryable'
    });
  });

  test('the deadline scales with the number of devices polled', async () => {
    transport.getStates.mockImplementationOnce(async (_session: Session, ids: string[]) => {
      await new Promise(resolve => setTimeout(resolve, 70));
      return Object.fromEntries(ids.map(id => [id, { ok: false as const, error: new TransportError('offline', 'fatal') }]));
    });

    const results = await client.getStates(['hp-1', 'hp-2']);

    expect(Object.keys(results)).toEqual(['hp-1', 'hp-2']);
  });
});
