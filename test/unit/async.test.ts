import { backoffDelay, delay, withTimeout } from '../../src/util/async';
import { TransportError } from '../../src/util/error-handler';

describe('async helpers', () => {
  afterEach(() => {
    jest.useRealTimers();
  });

  test('delay resolves true once the time has passed', async () => {
    jest.useFakeTimers();
    const waiting = delay(100);

    jest.advanceTimersByTime(100);

    await expect(waiting).resolves.toBe(true);
  });

  test('delay resolves false when aborted', async () => {
    jest.useFakeTimers();
    const controller = new AbortController();
    const waiting = delay(1_000, controller.signal);

    controller.abort();

    await expect(waiting).resolves.toBe(false);
  });

  test('delay with an already aborted signal does not wait', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(delay(60_000, controller.signal)).resolves.toBe(false);
  });

  test('withTimeout passes through a result in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 50, 'listDevices')).resolves.toBe('ok');
  });

  test('withTimeout passes through a rejection', async () => {
    const error = new TransportError('bad payload', 'fatal');
    await expect(withTimeout(Promise.reject(error), 50, 'listDevices')).rejects.toBe(error);
  });

  test('withTimeout fails as retryable after the deadline', async () => {
    jest.useFakeTimers();
    const never = new Promise<string>(() => undefined);
    const racing = withTimeout(never, 200, 'getStates');

    jest.advanceTimersByTime(200);

    await expect(racing).rejects.toMatchObject({
      message: 'getStates timed out after 200ms',
      kind: 'retryable'
    });
  });

  test('backoffDelay doubles per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5].map(attempt => backoffDelay(attempt, 1_000, 10_000))).toEqual([1_000, 2_000, 4_000, 8_000, 10_000]);
  });
});
