import { describe, expect, test } from 'vitest';
import { fingerprint, jaccard, normalizeLabel, normalizeText } from '../../../src/questions/similarity.js';

describe('normalizeText', () => {
  test('lowercases, strips punctuation and collapses whitespace', () => {
    expect(normalizeText('  Years of   Experience? ')).toBe('years of experience');
    expect(normalizeText('Are you authorized to work in the U.S.?')).toBe('are you authorized to work in the us');
  });

  test('keeps non-ASCII letters and digits', () => {
    expect(normalizeText('Résumé (PDF) – 2 pages')).toBe('résumé pdf 2 pages');
  });

  test('splits hyphenated and underscored words like normalizeLabel does', () => {
    expect(normalizeText('Open to full-time, on_site work?')).toBe('open to full time on site work');
    expect(normalizeText('Full-time')).toBe(normalizeLabel('full_time'));
  });

  test('returns an empty string for punctuation only', () => {
    expect(normalizeText('?!...')).toBe('');
  });
});

describe('normalizeLabel', () => {
  test('splits identifiers into words', () => {
    expect(normalizeLabel('firstName')).toBe('first name');
    expect(normalizeLabel('last_name')).toBe('last name');
    expect(normalizeLabel('phone-number')).toBe('phone number');
    expect(normalizeLabel('applicant.email')).toBe('applicant email');
  });
});

describe('jaccard', () => {
  test('is the share of common tokens', () => {
    expect(jaccard('years of experience', 'years of experience')).toBe(1);
    expect(jaccard('email address', 'email')).toBe(0.5);
    expect(jaccard('desired salary', 'years of experience')).toBe(0);
  });

  test('ignores duplicate tokens', () => {
    expect(jaccard('yes yes', 'yes')).toBe(1);
  });

  test('scores empty input as 0', () => {
    expect(jaccard('', 'email')).toBe(0);
    expect(jaccard('', '')).toBe(0);
  });
});

describe('fingerprint', () => {
  test('is 16 hex characters and stable', () => {
    const a = fingerprint('years of experience');
    expect(a).toMatch(/^[0-9a-f]{16}$/);
    expect(fingerprint('years of experience')).toBe(a);
    expect(fingerprint('desired salary')).not.toBe(a);
  });
});
