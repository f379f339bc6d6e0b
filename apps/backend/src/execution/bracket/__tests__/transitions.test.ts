/**
 * Bracket and order transition tables
 */

import { BracketStateError } from '../../../common/errors';
import {
  assertBracketTransition,
  isFinalBracketState,
  isLiveOrderStatus,
  isValidBracketTransition,
  isValidOrderTransition,
} from '../transitions';

describe('bracket transitions', () => {
  it('should follow the happy path from signal to close', () => {
    expect(isValidBracketTransition('SIGNALED', 'ENTRY_PLACED')).toBe(true);
    expect(isValidBracketTransition('ENTRY_PLACED', 'ENTRY_FILLED')).toBe(true);
    expect(isValidBracketTransition('ENTRY_FILLED', 'PROTECTED')).toBe(true);
    expect(isValidBracketTransition('PROTECTED', 'CLOSED')).toBe(true);
  });

  it('should allow a protected position to fall back to ENTRY_FILLED', () => {
    expect(isValidBracketTransition('PROTECTED', 'ENTRY_FILLED')).toBe(true);
    expect(isValidBracketTransition('CLOSING', 'ENTRY_FILLED')).toBe(true);
  });

  it('should not skip the fill', () => {
    expect(isValidBracketTransition('ENTRY_PLACED', 'PROTECTED')).toBe(false);
    expect(isValidBracketTransition('ENTRY_PLACED', 'CLOSED')).toBe(false);
  });

  it('should treat CLOSED and CANCELED as final', () => {
    expect(isFinalBracketState('CLOSED')).toBe(true);
    expect(isFinalBracketState('CANCELED')).toBe(true);
    expect(isFinalBracketState('CLOSING')).toBe(false);
    expect(isValidBracketTransition('CLOSED', 'ENTRY_FILLED')).toBe(false);
  });

  it('should throw BracketStateError for an invalid transition', () => {
    expect(() => assertBracketTransition('position-1', 'CANCELED', 'PROTECTED')).toThrow(
      BracketStateError
    );
    expect(() => assertBracketTransition('position-1', 'CANCELED', 'PROTECTED')).toThrow(
      'Invalid bracket transition: CANCELED → PROTECTED'
    );
  });
});

describe('order transitions', () => {
  it('should accept same-status reports', () => {
    expect(isValidOrderTransition('OPEN', 'OPEN')).toBe(true);
    expect(isValidOrderTransition('CLOSED', 'CLOSED')).toBe(true);
  });

  it('should never move a final order back to OPEN', () => {
    expect(isValidOrderTransition('CANCELED', 'OPEN')).toBe(false);
    expect(isValidOrderTransition('CLOSED', 'CANCELED')).toBe(false);
  });

  it('should consider only PENDING and OPEN live', () => {
    expect(isLiveOrderStatus('PENDING')).toBe(true);
    expect(isLiveOrderStatus('OPEN')).toBe(true);
    expect(isLiveOrderStatus('EXPIRED')).toBe(false);
  });
});
