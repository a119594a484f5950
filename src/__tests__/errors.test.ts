import { describe, expect, it } from 'vitest';
import { coinsToAtoms, formatAtoms, parsePositiveIntegerEnv } from '../config/constants';
import { Errors, hasErrorCode, TicketBuyerError, TicketBuyerErrorCode, wrapError } from '../errors';

describe('TicketBuyerError', () => {
  it('classifies recoverable and fatal codes', () => {
    expect(Errors.insufficientBalance(2n, 1n).recoverable).toBe(true);
    expect(Errors.missingCommitment().recoverable).toBe(true);
    expect(Errors.bug('broken').fatal).toBe(true);
    expect(new TicketBuyerError(TicketBuyerErrorCode.PUBLISH_FAILED, 'x').fatal).toBe(true);
    const invalid = Errors.invalidArgument('x');
    expect([invalid.recoverable, invalid.fatal]).toEqual([false, false]);
  });

  it('wraps foreign errors and keeps their message', () => {
    const cause = new Error('socket hang up');
    const wrapped = wrapError(cause);
    expect(wrapped.code).toBe(TicketBuyerErrorCode.TRANSPORT);
    expect(wrapped.message).toBe('socket hang up');
    expect(wrapped.cause).toBe(cause);
    expect(wrapError('boom', TicketBuyerErrorCode.RPC_ERROR)).toMatchObject({ code: 'RPC_ERROR', message: 'boom' });

    const own = Errors.cancelled();
    expect(wrapError(own)).toBe(own);
    expect(own.message).toBe('attempt cancelled');
    expect(hasErrorCode(own, TicketBuyerErrorCode.CANCELLED)).toBe(true);
  });

  it('serializes to JSON with its details', () => {
    expect(Errors.invalidState('sign', 'built').toJSON()).toEqual({
      name: 'TicketBuyerError',
      code: 'INVALID_STATE',
      message: 'cannot sign in state built',
      recoverable: false,
      fatal: false,
      details: { operation: 'sign', state: 'built' },
    });
  });
});

describe('amount helpers', () => {
  it('converts coins to atoms', () => {
    expect(coinsToAtoms(0.0001)).toBe(10_000n);
    expect(coinsToAtoms(1.5)).toBe(150_000_000n);
    expect(() => coinsToAtoms(Number.NaN)).toThrow('invalid coin amount: NaN');
  });

  it('formats atoms as coins', () => {
    expect(formatAtoms(150_000_000n)).toBe('1.5 DCR');
    expect(formatAtoms(2980n)).toBe('0.0000298 DCR');
    expect(formatAtoms(-100_000_000n)).toBe('-1 DCR');
  });

  it('parses positive integers with a fallback', () => {
    expect(parsePositiveIntegerEnv('12', 5)).toBe(12);
    expect(parsePositiveIntegerEnv('1.5', 5)).toBe(5);
    expect(parsePositiveIntegerEnv(undefined, 5)).toBe(5);
  });
});
