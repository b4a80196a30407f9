/**
 * =============================================================================
 * CIRCUIT BREAKER - State Machine Tests
 * =============================================================================
 */

import {
  CircuitBreaker,
  CircuitOpenError,
  CircuitState,
  CircuitTimeoutError
} from '../shared/resilience/circuit-breaker';

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

const fail = () => Promise.reject(new Error('dependency down'));
const succeed = () => Promise.resolve('ok');

function recordingBreaker(successThreshold: number): { breaker: CircuitBreaker; transitions: string[] } {
  const transitions: string[] = [];
  const breaker = new CircuitBreaker({
    name: 'test',
    failureThreshold: 1,
    successThreshold,
    resetTimeout: 0,
    onStateChange: (from, to) => transitions.push(`${from}->${to}`)
  });
  return { breaker, transitions };
}

describe('CircuitBreaker', () => {
  it('opens after the failure threshold and rejects without calling through', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2, resetTimeout: 60000 });
    const call = jest.fn(fail);

    await expect(breaker.execute(call)).rejects.toThrow('dependency down');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
    await expect(breaker.execute(call)).rejects.toThrow('dependency down');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    await expect(breaker.execute(call)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(call).toHaveBeenCalledTimes(2);
  });

  it('counts only consecutive failures', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2 });

    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');
    await breaker.execute(succeed);
    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');

    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('recovers through HALF_OPEN once the reset timeout has passed', async () => {
    const { breaker, transitions } = recordingBreaker(1);

    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');
    await expect(breaker.execute(succeed)).resolves.toBe('ok');

    expect(transitions).toEqual(['CLOSED->OPEN', 'OPEN->HALF_OPEN', 'HALF_OPEN->CLOSED']);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('stays HALF_OPEN until enough calls succeed', async () => {
    const { breaker } = recordingBreaker(2);

    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');
    await breaker.execute(succeed);
    expect(breaker.getState()).toBe(CircuitState.HALF_OPEN);

    await breaker.execute(succeed);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('reopens on a failure while HALF_OPEN', async () => {
    const { breaker, transitions } = recordingBreaker(2);

    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');
    await expect(breaker.execute(fail)).rejects.toThrow('dependency down');

    expect(transitions).toEqual(['CLOSED->OPEN', 'OPEN->HALF_OPEN', 'HALF_OPEN->OPEN']);
    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('times out slow calls', async () => {
    const breaker = new CircuitBreaker({ name: 'test', requestTimeout: 10 });

    await expect(breaker.execute(() => new Promise<string>(() => undefined)))
      .rejects.toBeInstanceOf(CircuitTimeoutError);
  });
});
