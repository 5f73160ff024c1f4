import { InvalidArgumentError } from './errors';
import { rotateLeft } from './utils/bits';
import type { AsciiNameHashMode, AsciiNameHashResult } from './types';

const NAME_HASH_SEED = 0x6da3b944;

export interface AsciiNameHashOptions {
  /** Number of leading bytes to hash. Defaults to the whole buffer. */
  length?: number;
  /** Defaults to 'corrected'. */
  mode?: AsciiNameHashMode;
}

/**
 * Hash a name given as UTF-16 code units.
 *
 * Two accumulators run over the even and odd code units respectively and are
 * folded together at the end. The empty name hashes to 0x115cfdb1.
 */
export function computeNameHash(name: string | Uint16Array): number {
  if (typeof name === 'string') {
    const text = name;
    return hashCodeUnits(text.length, (i) => text.charCodeAt(i));
  }
  if (!(name instanceof Uint16Array)) {
    throw new InvalidArgumentError('name', name, 'expected a string or Uint16Array');
  }
  const units = name;
  return hashCodeUnits(units.length, (i) => units[i]);
}

/**
 * Hash a name given as raw bytes, reporting whether every byte was ASCII.
 *
 * For an all-ASCII buffer the corrected mode returns exactly what
 * computeNameHash returns for the same characters, so ASCII and UTF-16
 * encodings of a name share one identity.
 */
export function computeAsciiNameHash(data: Uint8Array, options: AsciiNameHashOptions = {}): AsciiNameHashResult {
  if (!(data instanceof Uint8Array)) {
    throw new InvalidArgumentError('data', data, 'expected a Uint8Array');
  }
  const length = options.length ?? data.length;
  if (!Number.isInteger(length) || length < 0 || length > data.length) {
    throw new InvalidArgumentError('length', length, `expected an integer in 0..${data.length}`);
  }
  const mode = options.mode ?? 'corrected';
  if (mode !== 'corrected' && mode !== 'legacy') {
    throw new InvalidArgumentError('mode', mode, "expected 'corrected' or 'legacy'");
  }
  // Legacy producers read the even byte twice.
  const oddOffset = mode === 'legacy' ? 0 : 1;

  let hash1 = NAME_HASH_SEED;
  let hash2 = 0;
  let asciiMask = 0;

  for (let i = 0; i < length; i += 2) {
    const b1 = data[i];
    asciiMask |= b1;
    hash1 = (hash1 + rotateLeft(hash1, 5)) ^ b1;
    if (i + 1 < length) {
      const b2 = data[i + oddOffset];
      asciiMask |= b2;
      hash2 = (hash2 + rotateLeft(hash2, 5)) ^ b2;
    }
  }

  return {
    hash: finish(hash1, hash2),
    isAscii: (asciiMask & 0x80) === 0,
  };
}

function hashCodeUnits(length: number, codeUnitAt: (index: number) => number): number {
  let hash1 = NAME_HASH_SEED;
  let hash2 = 0;

  for (let i = 0; i < length; i += 2) {
    hash1 = (hash1 + rotateLeft(hash1, 5)) ^ codeUnitAt(i);
    if (i + 1 < length) {
      hash2 = (hash2 + rotateLeft(hash2, 5)) ^ codeUnitAt(i + 1);
    }
  }

  return finish(hash1, hash2);
}

function finish(hash1: number, hash2: number): number {
  const h1 = (hash1 + rotateLeft(hash1, 8)) | 0;
  const h2 = (hash2 + rotateLeft(hash2, 8)) | 0;
  return h1 ^ h2;
}
