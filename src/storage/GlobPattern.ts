import { InvalidPatternError } from '../errors/ObjectStoreError';
import { S3_SCHEME, splitUri } from './ObjectReference';

/**
 * A glob compiled against object keys.
 *
 * `*` and `?` never cross a `/`, so `data/*` matches `data/a.txt` and the
 * implied directory `data/sub`, but not `data/sub/b.txt`.
 */
export interface CompiledGlobPattern {
  bucket: string;

  /** Key part of the pattern, leading slash removed */
  keyPattern: string;

  /** Unescaped key text before the first wildcard, used as the list prefix */
  literalPrefix: string;

  /** Number of `/`-separated segments in `keyPattern` */
  segmentCount: number;

  hasWildcard: boolean;

  regex: RegExp;
}

const REGEX_SPECIALS = /[.*+?^${}()|[\]\\/]/g;
const BUCKET_WILDCARDS = /[*?[\]\\]/;

function escapeRegex(text: string): string {
  return text.replace(REGEX_SPECIALS, '\\$&');
}

function escapeClassChar(char: string): string {
  return /[\\\]^[-]/.test(char) ? `\\${char}` : char;
}

/** One class member, possibly escaped, read as a whole code point */
function readClassChar(
  keyPattern: string,
  index: number
): { char: string; codePoint: number; next: number } | undefined {
  const at = keyPattern[index] === '\\' ? index + 1 : index;
  const codePoint = keyPattern.codePointAt(at);
  if (codePoint === undefined) {
    return undefined;
  }
  const char = String.fromCodePoint(codePoint);
  return { char, codePoint, next: at + char.length };
}

/**
 * Translate one `[...]` expression starting at `start` (the `[`).
 * Returns the regex fragment and the index just past the closing `]`.
 */
function compileCharacterClass(
  keyPattern: string,
  start: number,
  pattern: string
): { fragment: string; next: number } {
  let index = start + 1;
  let negated = false;

  if (keyPattern[index] === '!' || keyPattern[index] === '^') {
    negated = true;
    index++;
  }

  let body = '';
  let first = true;

  while (index < keyPattern.length) {
    if (keyPattern[index] === ']' && !first) {
      const fragment = negated ? `[^/${body}]` : `(?!/)[${body}]`;
      return { fragment, next: index + 1 };
    }

    const low = readClassChar(keyPattern, index);
    if (!low) {
      break;
    }
    index = low.next;
    first = false;

    if (keyPattern[index] === '-' && index + 1 < keyPattern.length && keyPattern[index + 1] !== ']') {
      const high = readClassChar(keyPattern, index + 1);
      if (!high) {
        break;
      }
      if (low.codePoint > high.codePoint) {
        throw new InvalidPatternError('Character class range is out of order', pattern);
      }
      body += `${escapeClassChar(low.char)}-${escapeClassChar(high.char)}`;
      index = high.next;
    } else {
      body += escapeClassChar(low.char);
    }
  }

  throw new InvalidPatternError('Unterminated character class in glob pattern', pattern);
}

/**
 * Compile `s3://bucket/<glob>` for matching against listed keys.
 */
export function compileGlobPattern(pattern: string): CompiledGlobPattern {
  if (pattern.trim() === '') {
    throw new InvalidPatternError('Glob pattern is empty', pattern);
  }

  const { scheme, host, path } = splitUri(pattern.trim());

  if (scheme !== S3_SCHEME) {
    throw new InvalidPatternError("S3 pattern doesn't start with 's3://'", pattern);
  }
  if (host === '' || host === '.') {
    throw new InvalidPatternError("S3 pattern doesn't contain a bucket name", pattern);
  }
  if (BUCKET_WILDCARDS.test(host)) {
    throw new InvalidPatternError('Wildcards are not supported in bucket names', pattern);
  }

  const keyPattern = path.startsWith('/') ? path.slice(1) : path;
  if (keyPattern === '') {
    throw new InvalidPatternError("S3 pattern doesn't contain an object name", pattern);
  }

  let source = '';
  let literalPrefix = '';
  let hasWildcard = false;
  let index = 0;

  while (index < keyPattern.length) {
    const char = keyPattern[index];

    switch (char) {
      case '\\': {
        if (index + 1 >= keyPattern.length) {
          throw new InvalidPatternError('Glob pattern ends with an escape character', pattern);
        }
        const codePoint = keyPattern.codePointAt(index + 1);
        const literal = codePoint === undefined ? '' : String.fromCodePoint(codePoint);
        source += escapeRegex(literal);
        if (!hasWildcard) {
          literalPrefix += literal;
        }
        index += 1 + literal.length;
        break;
      }
      case '*':
        source += '[^/]*';
        hasWildcard = true;
        index++;
        break;
      case '?':
        source += '[^/]';
        hasWildcard = true;
        index++;
        break;
      case '[': {
        const { fragment, next } = compileCharacterClass(keyPattern, index, pattern);
        source += fragment;
        hasWildcard = true;
        index = next;
        break;
      }
      default:
        source += escapeRegex(char);
        if (!hasWildcard) {
          literalPrefix += char;
        }
        index++;
    }
  }

  return {
    bucket: host,
    keyPattern,
    literalPrefix,
    segmentCount: keyPattern.split('/').length,
    hasWildcard,
    regex: new RegExp(`^${source}$`, 'u'),
  };
}

/**
 * Key, or the implied directory above it, to test against the pattern.
 * Keys deeper than the pattern are cut to the pattern's segment count.
 * Undefined when the last segment is empty, as for a folder marker `a/`.
 */
export function candidateForKey(key: string, segmentCount: number): string | undefined {
  const segments = key.split('/').slice(0, segmentCount);
  if (segments[segments.length - 1] === '') {
    return undefined;
  }
  return segments.join('/');
}

export function matchesGlob(compiled: CompiledGlobPattern, key: string): boolean {
  const candidate = candidateForKey(key, compiled.segmentCount);
  return candidate !== undefined && compiled.regex.test(candidate);
}
