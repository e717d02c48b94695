import { describe, expect, it } from 'vitest';

import {
  BASELINE_VERSION,
  compareVersions,
  formatVersion,
  isNewerVersion,
  parseVersion,
  parseVersionOrThrow,
  stripVersionPrefix,
  type SemanticVersion,
} from '../../../src/release/semver';
import { ParseError } from '../../../src/errors';

function v(text: string): SemanticVersion {
  return parseVersionOrThrow(text);
}

describe('semver', () => {
  describe('stripVersionPrefix', () => {
    it('drops one leading non-digit marker', () => {
      expect(stripVersionPrefix('v1.2.3')).toBe('1.2.3');
      expect(stripVersionPrefix('V10.0.1')).toBe('10.0.1');
    });

    it('trims whitespace before looking at the prefix', () => {
      expect(stripVersionPrefix('  v1.2.3\n')).toBe('1.2.3');
    });

    it('leaves plain versions and empty strings alone', () => {
      expect(stripVersionPrefix('1.2.3')).toBe('1.2.3');
      expect(stripVersionPrefix('')).toBe('');
    });
  });

  describe('parseVersion', () => {
    it('parses a tag with a v prefix', () => {
      expect(parseVersion('v5.17.14')).toEqual({ major: '5', minor: '17', patch: '14' });
    });

    it('fills missing components with 0', () => {
      expect(parseVersion('2')).toEqual({ major: '2', minor: '0', patch: '0' });
      expect(parseVersion('v2.4')).toEqual({ major: '2', minor: '4', patch: '0' });
    });

    it('ignores components past the third', () => {
      expect(parseVersion('1.2.3.4')).toEqual({ major: '1', minor: '2', patch: '3' });
    });

    it('keeps leading zeros as written', () => {
      expect(parseVersion('01.2.3')).toEqual({ major: '01', minor: '2', patch: '3' });
    });

    it('rejects non-numeric components', () => {
      expect(parseVersion('1.2.3-beta')).toBeNull();
      expect(parseVersion('1.x.3')).toBeNull();
      expect(parseVersion('latest')).toBeNull();
    });

    it('rejects empty components', () => {
      expect(parseVersion('')).toBeNull();
      expect(parseVersion('v')).toBeNull();
      expect(parseVersion('1..3')).toBeNull();
      expect(parseVersion('1.2.')).toBeNull();
    });

    it('rejects negative numbers', () => {
      expect(parseVersion('1.-2.3')).toBeNull();
    });
  });

  describe('parseVersionOrThrow', () => {
    it('throws ParseError carrying the input', () => {
      try {
        parseVersionOrThrow('nightly');
        throw new Error('expected parseVersionOrThrow to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(ParseError);
        if (error instanceof ParseError) {
          expect(error.input).toBe('nightly');
          expect(error.message).toBe('Invalid release version "nightly"');
          expect(error.exitCode).toBe(3);
        }
      }
    });
  });

  describe('formatVersion', () => {
    it('joins components with dots', () => {
      expect(formatVersion(v('v1.2.3'))).toBe('1.2.3');
      expect(formatVersion(BASELINE_VERSION)).toBe('0.0.0');
    });
  });

  describe('compareVersions', () => {
    it('orders by major, then minor, then patch', () => {
      expect(compareVersions(v('1.2.3'), v('2.0.0'))).toBe('less');
      expect(compareVersions(v('1.3.0'), v('1.2.9'))).toBe('greater');
      expect(compareVersions(v('1.2.3'), v('1.2.4'))).toBe('less');
      expect(compareVersions(v('v1.2.3'), v('1.2.3'))).toBe('equal');
    });

    it('compares components as text, so 9 orders after 10', () => {
      expect(compareVersions(v('9.0.0'), v('10.0.0'))).toBe('greater');
      expect(compareVersions(v('1.9.0'), v('1.10.0'))).toBe('greater');
      expect(compareVersions(v('1.2.10'), v('1.2.2'))).toBe('less');
    });

    it('is antisymmetric and transitive', () => {
      const samples = ['0.0.0', '1.2.3', '1.10.0', '1.9.9', '2.0.0', '10.1.1', '9.0.0', '1.2.3'].map(v);
      const flip = { less: 'greater', equal: 'equal', greater: 'less' } as const;

      for (const a of samples) {
        for (const b of samples) {
          expect(compareVersions(b, a)).toBe(flip[compareVersions(a, b)]);
          for (const c of samples) {
            if (compareVersions(a, b) === 'less' && compareVersions(b, c) === 'less') {
              expect(compareVersions(a, c)).toBe('less');
            }
          }
        }
      }
    });
  });

  describe('isNewerVersion', () => {
    it('matches compareVersions(current, candidate) === less', () => {
      const samples = ['0.0.0', '1.2.3', '1.9.9', '2.0.0', '10.0.0'].map(v);
      for (const a of samples) {
        for (const b of samples) {
          expect(isNewerVersion(a, b)).toBe(compareVersions(a, b) === 'less');
        }
      }
    });

    it('treats anything above the baseline as newer', () => {
      expect(isNewerVersion(BASELINE_VERSION, v('v1.2.3'))).toBe(true);
      expect(isNewerVersion(v('2.0.0'), v('v1.9.9'))).toBe(false);
      expect(isNewerVersion(v('1.2.3'), v('1.2.3'))).toBe(false);
    });
  });
});
