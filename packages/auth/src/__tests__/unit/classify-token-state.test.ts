import { describe, it, expect } from 'vitest';
import { classifyTokenState, DEFAULT_SKEW_WINDOW_MS } from '../../evaluator/classify-token-state.js';
import { createRecord, NOW } from '../test-utils.js';

const MINUTE_MS = 60 * 1000;

describe('classifyTokenState', () => {
  it('should report absent for a missing record', () => {
    expect(classifyTokenState(null, NOW)).toEqual({ state: 'absent' });
  });

  it('should report absent when the access token is missing or empty', () => {
    expect(classifyTokenState({ refresh_token: 'r' }, NOW)).toEqual({ state: 'absent' });
    expect(classifyTokenState({ access_token: '', expires_at: NOW.toISOString() }, NOW)).toEqual({
      state: 'absent',
    });
  });

  it('should report corrupted when expires_at is missing', () => {
    expect(classifyTokenState({ access_token: 'a' }, NOW)).toEqual({
      state: 'corrupted',
      reason: 'expires_at is missing',
    });
  });

  it('should report corrupted when expires_at cannot be parsed', () => {
    expect(classifyTokenState({ access_token: 'a', expires_at: 'next tuesday' }, NOW)).toEqual({
      state: 'corrupted',
      reason: 'expires_at is not a valid timestamp',
    });
  });

  it('should report corrupted when expires_at is beyond the range of a date', () => {
    const corrupted = { state: 'corrupted', reason: 'expires_at is not a valid timestamp' };

    expect(classifyTokenState({ access_token: 'a', expires_at: 1e13 }, NOW)).toEqual(corrupted);
    expect(classifyTokenState({ access_token: 'a', expires_at: '99999999999999' }, NOW)).toEqual(corrupted);
  });

  it('should report valid outside the skew window', () => {
    const record = createRecord(DEFAULT_SKEW_WINDOW_MS + MINUTE_MS);
    const assessment = classifyTokenState(record, NOW);

    expect(assessment.state).toBe('valid');
    if (assessment.state === 'valid') {
      expect(assessment.record).toEqual(record);
      expect(assessment.expiresAt.toISOString()).toBe(record.expires_at);
    }
  });

  it('should report expired inside the skew window', () => {
    expect(classifyTokenState(createRecord(DEFAULT_SKEW_WINDOW_MS - MINUTE_MS), NOW).state).toBe('expired');
  });

  it('should report expired exactly at the skew boundary', () => {
    expect(classifyTokenState(createRecord(DEFAULT_SKEW_WINDOW_MS), NOW).state).toBe('expired');
  });

  it('should report expired after expiry', () => {
    expect(classifyTokenState(createRecord(-MINUTE_MS), NOW).state).toBe('expired');
  });

  it('should honour a custom skew window', () => {
    const record = createRecord(2 * MINUTE_MS);

    expect(classifyTokenState(record, NOW, 0).state).toBe('valid');
    expect(classifyTokenState(record, NOW, 3 * MINUTE_MS).state).toBe('expired');
  });

  it('should accept epoch seconds and fill defaults', () => {
    const expiresAtSeconds = NOW.getTime() / 1000 + 3600;
    const assessment = classifyTokenState({ access_token: 'a', expires_at: expiresAtSeconds }, NOW);

    expect(assessment).toEqual({
      state: 'valid',
      record: {
        access_token: 'a',
        expires_at: '2030-01-01T01:00:00.000Z',
        token_type: 'Bearer',
        scope: '',
      },
      expiresAt: new Date('2030-01-01T01:00:00.000Z'),
    });
  });

  it('should be deterministic', () => {
    const record = createRecord(10 * MINUTE_MS);
    expect(classifyTokenState(record, NOW)).toEqual(classifyTokenState(record, NOW));
  });
});
