/**
 * Circuit Breaker Tests
 * Opening on transport failures, fail-fast, half-open recovery
 */

import { ExchangeRejectionError, TransportError } from '../../../../common/errors';
import { CircuitBreaker } from '../CircuitBreaker';

const fail = (error: Error) => async (): Promise<never> => {
  throw error;
};

describe('CircuitBreaker', () => {
  let circuitBreaker: CircuitBreaker;
  let transitions: string[];

  beforeEach(() => {
    jest.useFakeTimers();
    transitions = [];
    circuitBreaker = new CircuitBreaker({
      failureThreshold: 5,
      successThreshold: 2,
      timeout: 1000,
      windowSize: 10,
      isFailure: (error) => error instanceof TransportError,
      onStateChange: (state) => transitions.push(state),
    });
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  async function fillWindowWithFailures(): Promise<void> {
    for (let i = 0; i < 5; i++) {
      await circuitBreaker.execute(async () => 'ok');
    }
    for (let i = 0; i < 5; i++) {
      await expect(circuitBreaker.execute(fail(new TransportError('timeout')))).rejects.toThrow(
        'timeout'
      );
    }
  }

  it('should start in CLOSED state', () => {
    expect(circuitBreaker.getState()).toBe('CLOSED');
    expect(circuitBreaker.getStateNumber()).toBe(0);
  });

  it('should pass results through while CLOSED', async () => {
    await expect(circuitBreaker.execute(async () => 'success')).resolves.toBe('success');
  });

  it('should open once the window holds enough transport failures', async () => {
    await fillWindowWithFailures();

    expect(circuitBreaker.getState()).toBe('OPEN');
    expect(transitions).toEqual(['OPEN']);
  });

  it('should fail fast while OPEN without calling the function', async () => {
    await fillWindowWithFailures();
    const fn = jest.fn(async () => 'never');

    await expect(circuitBreaker.execute(fn)).rejects.toThrow(
      'EXCHANGE_UNAVAILABLE: Circuit breaker open'
    );
    expect(fn).not.toHaveBeenCalled();
  });

  it('should not count exchange rejections as failures', async () => {
    for (let i = 0; i < 10; i++) {
      await expect(
        circuitBreaker.execute(fail(new ExchangeRejectionError('EOrder:Insufficient funds')))
      ).rejects.toThrow('EOrder:Insufficient funds');
    }

    expect(circuitBreaker.getState()).toBe('CLOSED');
  });

  it('should close again after enough successful test requests', async () => {
    await fillWindowWithFailures();
    jest.advanceTimersByTime(1000);

    await circuitBreaker.execute(async () => 'probe');
    expect(circuitBreaker.getState()).toBe('HALF_OPEN');

    await circuitBreaker.execute(async () => 'probe');
    expect(circuitBreaker.getState()).toBe('CLOSED');
    expect(transitions).toEqual(['OPEN', 'HALF_OPEN', 'CLOSED']);
  });

  it('should reopen when a test request fails', async () => {
    await fillWindowWithFailures();
    jest.advanceTimersByTime(1000);

    await expect(circuitBreaker.execute(fail(new TransportError('still down')))).rejects.toThrow(
      'still down'
    );

    expect(circuitBreaker.getState()).toBe('OPEN');
    expect(circuitBreaker.getStateNumber()).toBe(1);
  });

  it('should reset to CLOSED', async () => {
    await fillWindowWithFailures();

    circuitBreaker.reset();

    expect(circuitBreaker.getState()).toBe('CLOSED');
  });
});
