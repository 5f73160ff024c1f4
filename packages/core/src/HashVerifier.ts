import { DEFAULT_TYPE_HASHING_CONFIG } from './config/env-schema';
import type { TypeHashingConfig } from './config/env-schema';
import { computeAsciiNameHash } from './NameHash';
import {
  computeMethodDescriptorHash,
  computeTypeDescriptorHash,
  formatMethodDescriptor,
  formatTypeDescriptor,
} from './TypeDescriptor';
import { resolveHashCode } from './types';
import type { MethodDescriptor, TypeDescriptor } from './types';
import { formatHash } from './utils/bits';
import { logger } from './utils/logger';

export interface HashVerificationResult {
  matches: boolean;
  /** Stored hash, signed form */
  expected: number;
  /** Recomputed hash */
  actual: number;
  /** Readable name of what was verified, formatted on first read */
  readonly subject: string;
}

export interface AsciiNameVerificationResult extends HashVerificationResult {
  isAscii: boolean;
}

export interface AsciiNameVerifyOptions {
  /** Number of leading bytes holding the name. Defaults to the whole buffer. */
  length?: number;
}

/**
 * Re-derives identity hashes for records read from native metadata and
 * compares them with the stored values.
 *
 * A mismatch is reported, not thrown: the record may have been written by a
 * producer using a different hash variant, and the caller decides whether
 * that is fatal.
 */
export class TypeHashVerifier {
  private readonly config: TypeHashingConfig;

  constructor(config: Partial<TypeHashingConfig> = {}) {
    this.config = { ...DEFAULT_TYPE_HASHING_CONFIG, ...config };
  }

  get asciiNameHashMode(): TypeHashingConfig['asciiNameHashMode'] {
    return this.config.asciiNameHashMode;
  }

  verifyType(descriptor: TypeDescriptor, expected: number): HashVerificationResult {
    return this.report(() => formatTypeDescriptor(descriptor), expected, computeTypeDescriptorHash(descriptor), {});
  }

  verifyMethod(method: MethodDescriptor, expected: number): HashVerificationResult {
    return this.report(() => formatMethodDescriptor(method), expected, computeMethodDescriptorHash(method), {});
  }

  /**
   * Verify the name hash of a name stored as raw bytes, using the configured
   * ASCII hash mode. `isAscii` is the flag the hash itself reports, which in
   * legacy mode only covers even bytes.
   */
  verifyAsciiName(
    data: Uint8Array,
    expected: number,
    options: AsciiNameVerifyOptions = {}
  ): AsciiNameVerificationResult {
    const { hash, isAscii } = computeAsciiNameHash(data, {
      length: options.length,
      mode: this.config.asciiNameHashMode,
    });
    const name = data.subarray(0, options.length ?? data.length);
    const describe = (): string =>
      name.every((b) => b < 0x80) ? Buffer.from(name).toString('latin1') : `<${name.length} bytes>`;
    return this.report(describe, expected, hash, { isAscii });
  }

  private report<T extends object>(
    describe: () => string,
    expected: number,
    actual: number,
    extra: T
  ): HashVerificationResult & T {
    const expectedHash = resolveHashCode(expected, 'expected');
    const matches = expectedHash === actual;

    let subject: string | undefined;
    const subjectOnce = (): string => (subject ??= describe());

    if (!matches && this.config.logMismatches) {
      logger.warn(
        { subject: subjectOnce(), expected: formatHash(expectedHash), actual: formatHash(actual) },
        'Type hash mismatch'
      );
    } else if (matches && logger.isLevelEnabled('debug')) {
      logger.debug({ subject: subjectOnce(), hash: formatHash(actual) }, 'Type hash verified');
    }

    return {
      matches,
      expected: expectedHash,
      actual,
      ...extra,
      get subject(): string {
        return subjectOnce();
      },
    };
  }
}
