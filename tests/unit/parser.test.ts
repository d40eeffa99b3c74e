// ============================================================
// Tests for src/vibe/parser.ts
// Covers: parseVibeResponse, placeholders, rejection rules
// ============================================================

import { describe, it, expect } from 'vitest';
import { parseVibeResponse } from '../../src/vibe/parser';
import { SchemaFailure, describeFailure } from '../../src/vibe/errors';

const FULL_PAYLOAD =
  '{"mood":"Calm","genre":"Jazz","energy_level":"low","aesthetic_keywords":["smooth","night"],"suggested_music":"Miles Davis"}';

/** Runs the parser and returns the SchemaFailure it throws */
function failureOf(raw: string | null | undefined): SchemaFailure {
  try {
    parseVibeResponse(raw);
  } catch (err) {
    if (err instanceof SchemaFailure) return err;
    throw err;
  }
  throw new Error('expected parseVibeResponse to throw');
}

describe('parseVibeResponse', () => {
  describe('well-formed payloads', () => {
    it('should return all five fields exactly as given', () => {
      expect(parseVibeResponse(FULL_PAYLOAD)).toEqual({
        mood: 'Calm',
        genre: 'Jazz',
        energy_level: 'low',
        aesthetic_keywords: ['smooth', 'night'],
        suggested_music: 'Miles Davis',
      });
    });

    it('should ignore unexpected extra fields', () => {
      const raw = FULL_PAYLOAD.replace('{', '{"tempo":90,"notes":"extra",');
      const result = parseVibeResponse(raw);
      expect(Object.keys(result).sort()).toEqual([
        'aesthetic_keywords',
        'energy_level',
        'genre',
        'mood',
        'suggested_music',
      ]);
    });

    it('should pass an unrecognized energy level through unchanged', () => {
      const raw = FULL_PAYLOAD.replace('"low"', '"Extreme"');
      expect(parseVibeResponse(raw).energy_level).toBe('Extreme');
    });

    it('should unwrap a response that is entirely a ```json fence', () => {
      const result = parseVibeResponse('```json\n' + FULL_PAYLOAD + '\n```');
      expect(result.genre).toBe('Jazz');
    });
  });

  describe('missing or mistyped fields', () => {
    it('should default a missing genre to "Unknown" and keep the rest', () => {
      const raw = JSON.stringify({
        mood: 'Calm',
        energy_level: 'low',
        aesthetic_keywords: ['smooth', 'night'],
        suggested_music: 'Miles Davis',
      });
      expect(parseVibeResponse(raw)).toEqual({
        mood: 'Calm',
        genre: 'Unknown',
        energy_level: 'low',
        aesthetic_keywords: ['smooth', 'night'],
        suggested_music: 'Miles Davis',
      });
    });

    it('should default missing keywords to an empty list', () => {
      const raw = JSON.stringify({ mood: 'Calm', genre: 'Jazz', energy_level: 'low', suggested_music: 'Miles Davis' });
      expect(parseVibeResponse(raw).aesthetic_keywords).toEqual([]);
    });

    it('should fill every placeholder for an empty object', () => {
      expect(parseVibeResponse('{}')).toEqual({
        mood: 'Unknown',
        genre: 'Unknown',
        energy_level: 'Unknown',
        aesthetic_keywords: [],
        suggested_music: 'Unknown',
      });
    });

    it('should not coerce a number into a string field', () => {
      const raw = FULL_PAYLOAD.replace('"Calm"', '42');
      expect(parseVibeResponse(raw).mood).toBe('Unknown');
    });

    it('should treat blank strings as missing', () => {
      const raw = FULL_PAYLOAD.replace('"Miles Davis"', '"   "');
      expect(parseVibeResponse(raw).suggested_music).toBe('Unknown');
    });

    it('should drop keyword entries that are not non-empty strings', () => {
      const raw = FULL_PAYLOAD.replace('["smooth","night"]', '["smooth","",3,null,"night"]');
      expect(parseVibeResponse(raw).aesthetic_keywords).toEqual(['smooth', 'night']);
    });

    it('should default keywords given as a plain string', () => {
      const raw = FULL_PAYLOAD.replace('["smooth","night"]', '"smooth, night"');
      expect(parseVibeResponse(raw).aesthetic_keywords).toEqual([]);
    });
  });

  describe('rejected output', () => {
    it.each([null, undefined, '', '   \n'])('should fail with "empty output" for %j', (raw) => {
      const failure = failureOf(raw);
      expect(failure.reason).toBe('empty output');
      expect(failure.message).toBe('empty output');
      expect(failure.detail).toBeNull();
    });

    it('should fail with "parse error" for text that is not JSON', () => {
      const failure = failureOf('not json');
      expect(failure.reason).toBe('parse error');
      expect(failure.detail).not.toBeNull();
      expect(failure.message.startsWith('parse error: ')).toBe(true);
    });

    it.each(['Unlimited good vibes!', 'No permission needed to vibe'])(
      'should classify malformed output %j as a generic error',
      (raw) => {
        const failure = failureOf(raw);
        expect(failure.reason).toBe('parse error');
        expect(describeFailure(failure).kind).toBe('GenericServiceError');
      },
    );

    it('should not salvage fields from truncated JSON', () => {
      expect(failureOf('{"mood": "Calm", "genre": "Ja').reason).toBe('parse error');
    });

    it('should reject a fenced payload surrounded by commentary', () => {
      const raw = 'Here is your vibe:\n```json\n' + FULL_PAYLOAD + '\n```';
      expect(failureOf(raw).reason).toBe('parse error');
    });

    it('should reject a JSON array', () => {
      const failure = failureOf('[' + FULL_PAYLOAD + ']');
      expect(failure.reason).toBe('parse error');
      expect(failure.message).toBe('parse error: expected a JSON object, got array');
    });

    it('should reject JSON scalars', () => {
      expect(failureOf('"Calm"').detail).toBe('expected a JSON object, got string');
      expect(failureOf('null').detail).toBe('expected a JSON object, got null');
      expect(failureOf('7').detail).toBe('expected a JSON object, got number');
    });
  });
});
