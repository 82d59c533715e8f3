import { InvalidPatternError } from '../src/errors/ObjectStoreError';
import {
  candidateForKey,
  compileGlobPattern,
  matchesGlob,
} from '../src/storage/GlobPattern';

describe('GlobPattern', () => {
  describe('compileGlobPattern', () => {
    it('should split bucket, literal prefix and segment count', () => {
      const compiled = compileGlobPattern('s3://test-bucket/data/*/train*');

      expect(compiled.bucket).toBe('test-bucket');
      expect(compiled.keyPattern).toBe('data/*/train*');
      expect(compiled.literalPrefix).toBe('data/');
      expect(compiled.segmentCount).toBe(3);
      expect(compiled.hasWildcard).toBe(true);
    });

    it('should stop the literal prefix at the first wildcard', () => {
      expect(compileGlobPattern('s3://b/logs/2024-*/part-?').literalPrefix).toBe('logs/2024-');
      expect(compileGlobPattern('s3://b/?x').literalPrefix).toBe('');
    });

    it('should unescape escaped characters in the literal prefix', () => {
      const compiled = compileGlobPattern('s3://b/dir/file\\*.txt');

      expect(compiled.literalPrefix).toBe('dir/file*.txt');
      expect(compiled.hasWildcard).toBe(false);
      expect(compiled.regex.test('dir/file*.txt')).toBe(true);
      expect(compiled.regex.test('dir/file1.txt')).toBe(false);
    });

    it.each([
      ['', 'Glob pattern is empty: '],
      ['   ', 'Glob pattern is empty:    '],
      ['gs://b/*', "S3 pattern doesn't start with 's3://': gs://b/*"],
      ['s3:///x/*', "S3 pattern doesn't contain a bucket name: s3:///x/*"],
      ['s3://buck*/x', 'Wildcards are not supported in bucket names: s3://buck*/x'],
      ['s3://b', "S3 pattern doesn't contain an object name: s3://b"],
      ['s3://b/a\\', 'Glob pattern ends with an escape character: s3://b/a\\'],
      ['s3://b/[abc', 'Unterminated character class in glob pattern: s3://b/[abc'],
      ['s3://b/x[!', 'Unterminated character class in glob pattern: s3://b/x[!'],
      ['s3://b/log-[z-a].txt', 'Character class range is out of order: s3://b/log-[z-a].txt'],
    ])('should reject %j', (pattern, message) => {
      expect(() => compileGlobPattern(pattern)).toThrow(InvalidPatternError);
      expect(() => compileGlobPattern(pattern)).toThrow(message);
    });
  });

  describe('matching', () => {
    const matches = (pattern: string, key: string): boolean =>
      compileGlobPattern(`s3://b/${pattern}`).regex.test(key);

    it('should match star within one segment', () => {
      expect(matches('a/*.txt', 'a/1.txt')).toBe(true);
      expect(matches('a/*.txt', 'a/.txt')).toBe(true);
      expect(matches('a/*.txt', 'a/sub/1.txt')).toBe(false);
      expect(matches('a/*.txt', 'a/1.txt.bak')).toBe(false);
    });

    it('should match question mark as one non-slash character', () => {
      expect(matches('a?b', 'axb')).toBe(true);
      expect(matches('a?b', 'ab')).toBe(false);
      expect(matches('a?b', 'a/b')).toBe(false);
    });

    it('should support ranges and negated classes', () => {
      expect(matches('log-[0-9].txt', 'log-7.txt')).toBe(true);
      expect(matches('log-[0-9].txt', 'log-a.txt')).toBe(false);
      expect(matches('[!abc].txt', 'd.txt')).toBe(true);
      expect(matches('[!abc].txt', 'a.txt')).toBe(false);
      expect(matches('[^abc].txt', 'a.txt')).toBe(false);
    });

    it('should accept ranges with escaped bounds', () => {
      expect(matches('[\\!-\\-]', '+')).toBe(true);
      expect(matches('[a\\-z]', '-')).toBe(true);
      expect(matches('[a\\-z]', 'm')).toBe(false);
    });

    it('should match whole code points outside the basic plane', () => {
      expect(matches('a?b', 'a\u{1F600}b')).toBe(true);
      expect(matches('[\u{1F600}x].txt', '\u{1F600}.txt')).toBe(true);
      expect(matches('[\u{1F600}-\u{1F64F}]', '\u{1F610}')).toBe(true);
      expect(matches('\\\u{1F600}*', '\u{1F600}.txt')).toBe(true);
    });

    it('should treat a leading closing bracket as a class member', () => {
      expect(matches('[]]x', ']x')).toBe(true);
      expect(matches('[]]x', 'ax')).toBe(false);
    });

    it('should never let a character class match a slash', () => {
      expect(matches('a[/]b', 'a/b')).toBe(false);
      expect(matches('a[!x]b', 'a/b')).toBe(false);
    });

    it('should match regex metacharacters literally', () => {
      expect(matches('a+b(c).txt', 'a+b(c).txt')).toBe(true);
      expect(matches('a+b(c).txt', 'aab(c).txt')).toBe(false);
      expect(matches('v1.0', 'v1x0')).toBe(false);
    });
  });

  describe('candidateForKey', () => {
    it('should cut deeper keys to the pattern depth', () => {
      expect(candidateForKey('a/b/c.txt', 2)).toBe('a/b');
    });

    it('should leave keys at or above the pattern depth unchanged', () => {
      expect(candidateForKey('a/b', 2)).toBe('a/b');
      expect(candidateForKey('a', 2)).toBe('a');
    });

    it('should skip keys whose last segment is empty', () => {
      expect(candidateForKey('a/', 2)).toBeUndefined();
      expect(candidateForKey('a//b', 2)).toBeUndefined();
    });
  });

  describe('matchesGlob', () => {
    it('should match an implied directory of a deeper key', () => {
      const compiled = compileGlobPattern('s3://b/data/shard-*');

      expect(matchesGlob(compiled, 'data/shard-0/train-00001')).toBe(true);
      expect(matchesGlob(compiled, 'data/README')).toBe(false);
    });

    it('should not match a folder marker', () => {
      expect(matchesGlob(compileGlobPattern('s3://b/a/*'), 'a/')).toBe(false);
    });
  });
});
