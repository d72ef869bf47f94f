import { describe, it, expect } from 'vitest';
import { isFailureReason, seatLabel, truncate } from './format.js';

describe('seatLabel', () => {
  it('splits the seat number off the role', () => {
    expect(seatLabel('critic-2')).toBe('CRITIC 2');
    expect(seatLabel('code-reviewer-10')).toBe('CODE-REVIEWER 10');
    expect(seatLabel('solo')).toBe('SOLO');
  });
});

describe('truncate', () => {
  it('flattens newlines and cuts with an ellipsis', () => {
    expect(truncate('  one\ntwo  ', 20)).toBe('one two');
    expect(truncate('abcdefghij', 5)).toBe('abcd…');
  });
});

describe('isFailureReason', () => {
  it('flags the reasons that exit with 2', () => {
    expect(isFailureReason('complete')).toBe(false);
    expect(isFailureReason('killed')).toBe(false);
    expect(isFailureReason('belowThreshold')).toBe(true);
    expect(isFailureReason('persistenceFailure')).toBe(true);
  });
});
