// tests/utils.test.ts — Formatting helpers and the in-memory logger

import { describe, it, expect } from 'vitest';
import { formatDuration, formatMoney, generateUnitId } from '../src/shared/utils.js';
import { createMemoryLogger } from '../src/shared/logger.js';
import { GameOver, InvalidTransition, isDomainError } from '../src/shared/errors.js';

describe('formatMoney', () => {
  it.each([
    [0, '0.00'],
    [5, '0.05'],
    [700, '7.00'],
    [1234, '12.34'],
    [-150, '-1.50'],
  ])('should format %i cents as %s', (cents, text) => {
    expect(formatMoney(cents)).toBe(text);
  });
});

describe('formatDuration', () => {
  it('should pad hours, minutes and seconds', () => {
    expect(formatDuration(0)).toBe('00:00:00');
    expect(formatDuration(3725)).toBe('01:02:05');
  });
});

describe('generateUnitId', () => {
  it('should not repeat', () => {
    const ids = new Set(Array.from({ length: 50 }, generateUnitId));
    expect(ids.size).toBe(50);
  });
});

describe('createMemoryLogger', () => {
  it('should keep the most recent lines', () => {
    const logger = createMemoryLogger(2);
    logger.log('[factory]', 'one');
    logger.warn('[factory] two');
    logger.log('[factory] three');

    expect(logger.lines()).toEqual(['[factory] two', '[factory] three']);
  });
});

describe('errors', () => {
  it('should tell domain errors from the end of the game', () => {
    const error = new InvalidTransition('Cannot move while moving');
    expect(isDomainError(error)).toBe(true);
    expect(error.toJSON()).toEqual({ code: 'INVALID_TRANSITION', message: 'Cannot move while moving' });
    expect(isDomainError(new GameOver(30, 120))).toBe(false);
  });
});
