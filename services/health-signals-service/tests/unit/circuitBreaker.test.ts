// Mock logger to silence output and observe behavior
jest.mock('@/logger', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { CircuitBreaker } from '@/modules/circuitBreaker';
import { logger } from '@/logger';

const FIXED_NOW = 1_790_000_000_000;

const createBreaker = (failureThreshold = 3, cooldownMs = 5_000) =>
  new CircuitBreaker({ name: 'test-breaker', failureThreshold, cooldownMs });

describe('CircuitBreaker (unit)', () => {
  beforeEach(() => {
    jest.spyOn(Date, 'now').mockReturnValue(FIXED_NOW);
  });

  test('guard allows requests while closed', () => {
    const breaker = createBreaker();

    expect(breaker.guard()).toBe(true);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Reaching the failure threshold opens the breaker
   * for the cooldown window.
   */
  test('opens after the failure threshold and blocks during cooldown', () => {
    const breaker = createBreaker(2, 5_000);

    breaker.failure(new Error('upstream error'));
    breaker.failure(new Error('upstream error'));

    expect(breaker.current()).toBe('open');
    expect(breaker.guard()).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      { breaker: 'test-breaker', failures: 2, cooldownMs: 5_000 },
      'Circuit breaker opened'
    );
    expect(logger.warn).toHaveBeenCalledWith(
      { breaker: 'test-breaker', openUntil: new Date(FIXED_NOW + 5_000).toISOString() },
      'Circuit breaker open, skipping upstream request'
    );
  });

  test('stays closed below the threshold', () => {
    const breaker = createBreaker(3);

    breaker.failure('boom');

    expect(breaker.guard()).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      { breaker: 'test-breaker', failures: 1, err: 'boom' },
      'Upstream request failed'
    );
  });

  test('allows requests again once the cooldown has passed', () => {
    const breaker = createBreaker(1, 1_000);
    breaker.failure();

    jest.spyOn(Date, 'now').mockReturnValue(FIXED_NOW + 1_001);

    expect(breaker.current()).toBe('half_open');
    expect(breaker.guard()).toBe(true);
    expect(logger.info).toHaveBeenCalledWith(
      { breaker: 'test-breaker' },
      'Circuit breaker half-open, probing upstream'
    );
  });

  /**
   * Purpose:
   * A failed probe reopens the breaker without waiting
   * for the threshold again.
   */
  test('reopens immediately when the half-open probe fails', () => {
    const breaker = createBreaker(3, 1_000);
    breaker.failure();
    breaker.failure();
    breaker.failure();

    jest.spyOn(Date, 'now').mockReturnValue(FIXED_NOW + 1_001);
    breaker.failure(new Error('still down'));

    expect(breaker.current()).toBe('open');
    jest.spyOn(Date, 'now').mockReturnValue(FIXED_NOW + 2_002);
    expect(breaker.current()).toBe('half_open');
    expect(logger.error).toHaveBeenLastCalledWith(
      { breaker: 'test-breaker', failures: 4, cooldownMs: 1_000 },
      'Circuit breaker reopened after failed probe'
    );
  });

  test('a successful probe closes the breaker', () => {
    const breaker = createBreaker(1, 1_000);
    breaker.failure();

    jest.spyOn(Date, 'now').mockReturnValue(FIXED_NOW + 1_001);
    breaker.success();

    expect(breaker.current()).toBe('closed');
  });

  test('success resets the failure count', () => {
    const breaker = createBreaker(2);
    breaker.failure();

    breaker.success();
    breaker.failure();

    expect(breaker.current()).toBe('closed');
    expect(logger.warn).toHaveBeenLastCalledWith(
      { breaker: 'test-breaker', failures: 1, err: 'undefined' },
      'Upstream request failed'
    );
    expect(logger.info).toHaveBeenCalledWith(
      { breaker: 'test-breaker' },
      'Circuit breaker reset after successful request'
    );
  });
});
