import { describe, it, expect } from 'vitest';
import { DuplicateSuppressor } from '../src/reader/duplicate.js';

const T0 = new Date('2026-03-02T07:00:00.000Z');

function at(ms: number): Date {
  return new Date(T0.getTime() + ms);
}

describe('DuplicateSuppressor', () => {
  it('should accept the first read of a token', () => {
    const suppressor = new DuplicateSuppressor();
    expect(suppressor.accept('0001000003', T0)).toBe(true);
  });

  it('should reject the same token inside the window', () => {
    const suppressor = new DuplicateSuppressor(2000);
    suppressor.accept('0001000003', T0);

    expect(suppressor.accept('0001000003', at(500))).toBe(false);
    expect(suppressor.accept('0001000003', at(1999))).toBe(false);
  });

  it('should accept the same token once the window has passed', () => {
    const suppressor = new DuplicateSuppressor(2000);
    suppressor.accept('0001000003', T0);

    expect(suppressor.accept('0001000003', at(2000))).toBe(true);
  });

  it('should measure the window from the last accepted read', () => {
    const suppressor = new DuplicateSuppressor(2000);
    suppressor.accept('0001000003', T0);
    suppressor.accept('0001000003', at(1500));

    // the rejected read at 1500 does not extend the window
    expect(suppressor.accept('0001000003', at(2100))).toBe(true);
  });

  it('should accept a different token immediately', () => {
    const suppressor = new DuplicateSuppressor(2000);
    suppressor.accept('0001000003', T0);

    expect(suppressor.accept('0001000002', at(10))).toBe(true);
    expect(suppressor.accept('0001000003', at(20))).toBe(true);
  });

  it('should accept a repeat after reset', () => {
    const suppressor = new DuplicateSuppressor(2000);
    suppressor.accept('0001000003', T0);
    suppressor.reset();

    expect(suppressor.accept('0001000003', at(10))).toBe(true);
  });
});
