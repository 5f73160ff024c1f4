import { TypeHashVerifier } from '../HashVerifier';
import { computeNameHash } from '../NameHash';
import * as TypeDescriptorModule from '../TypeDescriptor';
import { InvalidArgumentError } from '../errors';
import type { TypeDescriptor } from '../types';
import { toUint32 } from '../utils/bits';
import { logger } from '../utils/logger';

const int32: TypeDescriptor = { kind: 'named', name: 'System.Int32' };

describe('TypeHashVerifier', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(logger, 'warn').mockImplementation();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('verifyType', () => {
    test('should report a match', () => {
      const verifier = new TypeHashVerifier();
      expect(verifier.verifyType(int32, -1115910990)).toEqual({
        matches: true,
        expected: -1115910990,
        actual: -1115910990,
        subject: 'System.Int32',
      });
      expect(warnSpy).not.toHaveBeenCalled();
    });

    test('should accept the stored hash in unsigned form', () => {
      const result = new TypeHashVerifier().verifyType(int32, toUint32(-1115910990));
      expect(result.matches).toBe(true);
      expect(result.expected).toBe(-1115910990);
    });

    test('should log a mismatch without throwing', () => {
      const result = new TypeHashVerifier().verifyType(int32, 1);
      expect(result).toEqual({ matches: false, expected: 1, actual: -1115910990, subject: 'System.Int32' });
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledWith(
        { subject: 'System.Int32', expected: '0x00000001', actual: '0xbd7c8cb2' },
        'Type hash mismatch'
      );
    });

    test('should stay quiet when mismatch logging is off', () => {
      const result = new TypeHashVerifier({ logMismatches: false }).verifyType(int32, 1);
      expect(result.matches).toBe(false);
      expect(warnSpy).not.toHaveBeenCalled();
    });

    test('should verify arrays of the largest rank', () => {
      const descriptor: TypeDescriptor = { kind: 'array', element: int32, rank: 0x7fffffff };
      expect(new TypeHashVerifier().verifyType(descriptor, -125874589)).toEqual({
        matches: true,
        expected: -125874589,
        actual: -125874589,
        subject: 'System.Int32[rank=2147483647]',
      });
    });

    test('should log a bounded subject for a large-rank mismatch', () => {
      const descriptor: TypeDescriptor = { kind: 'array', element: int32, rank: 0x7fffffff };
      expect(new TypeHashVerifier().verifyType(descriptor, 0).matches).toBe(false);
      expect(warnSpy).toHaveBeenCalledWith(
        { subject: 'System.Int32[rank=2147483647]', expected: '0x00000000', actual: '0xf87f4e63' },
        'Type hash mismatch'
      );
    });

    test('should reject a stored hash that is not a 32-bit integer', () => {
      expect(() => new TypeHashVerifier().verifyType(int32, 2 ** 33)).toThrow(InvalidArgumentError);
    });
  });

  describe('subject formatting', () => {
    test('should not format the subject of a silent match until it is read', () => {
      const formatSpy = jest.spyOn(TypeDescriptorModule, 'formatTypeDescriptor');
      const result = new TypeHashVerifier().verifyType(int32, -1115910990);
      expect(formatSpy).not.toHaveBeenCalled();

      expect(result.subject).toBe('System.Int32');
      expect(result.subject).toBe('System.Int32');
      expect(formatSpy).toHaveBeenCalledTimes(1);
    });

    test('should not format the subject of an unlogged mismatch', () => {
      const formatSpy = jest.spyOn(TypeDescriptorModule, 'formatTypeDescriptor');
      new TypeHashVerifier({ logMismatches: false }).verifyType(int32, 1);
      expect(formatSpy).not.toHaveBeenCalled();
    });

    test('should reuse the subject formatted for the warning', () => {
      const formatSpy = jest.spyOn(TypeDescriptorModule, 'formatTypeDescriptor');
      const result = new TypeHashVerifier().verifyType(int32, 1);
      expect(result.subject).toBe('System.Int32');
      expect(formatSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe('verifyMethod', () => {
    test('should verify a generic method instantiation', () => {
      const result = new TypeHashVerifier().verifyMethod(
        { owner: { kind: 'named', name: 'System.String' }, name: 'Foo', genericArguments: [int32] },
        -128804481
      );
      expect(result).toEqual({
        matches: true,
        expected: -128804481,
        actual: -128804481,
        subject: 'System.String.Foo<System.Int32>',
      });
    });
  });

  describe('verifyAsciiName', () => {
    test('should use corrected mode by default', () => {
      const verifier = new TypeHashVerifier();
      expect(verifier.asciiNameHashMode).toBe('corrected');
      expect(verifier.verifyAsciiName(Buffer.from('ab', 'latin1'), 1023210416)).toEqual({
        matches: true,
        expected: 1023210416,
        actual: 1023210416,
        subject: 'ab',
        isAscii: true,
      });
    });

    test('legacy mode should match hashes written by older producers', () => {
      const verifier = new TypeHashVerifier({ asciiNameHashMode: 'legacy' });
      expect(verifier.verifyAsciiName(Buffer.from('ab', 'latin1'), 1023209651).matches).toBe(true);

      const corrected = verifier.verifyAsciiName(Buffer.from('ab', 'latin1'), 1023210416);
      expect(corrected.matches).toBe(false);
      expect(warnSpy).toHaveBeenCalledWith(
        { subject: 'ab', expected: '0x3cfcf3b0', actual: '0x3cfcf0b3' },
        'Type hash mismatch'
      );
    });

    test('should verify a name stored at the start of a larger buffer', () => {
      const record = Buffer.from('abcdef', 'latin1');
      expect(new TypeHashVerifier().verifyAsciiName(record, -594637474, { length: 3 })).toEqual({
        matches: true,
        expected: -594637474,
        actual: -594637474,
        subject: 'abc',
        isAscii: true,
      });
    });

    test('should ignore non-ASCII bytes past the name length in the subject', () => {
      const result = new TypeHashVerifier().verifyAsciiName(new Uint8Array([0x61, 0xff]), 1023185362, { length: 1 });
      expect(result.matches).toBe(true);
      expect(result.subject).toBe('a');
    });

    test('should reject a length past the end of the buffer', () => {
      expect(() => new TypeHashVerifier().verifyAsciiName(Buffer.from('ab', 'latin1'), 0, { length: 3 })).toThrow(
        InvalidArgumentError
      );
    });

    test('legacy mode should not print odd high bytes in the subject', () => {
      const verifier = new TypeHashVerifier({ asciiNameHashMode: 'legacy' });
      // The legacy hash reads byte 0 twice, so these bytes hash like "AA".
      const result = verifier.verifyAsciiName(new Uint8Array([0x41, 0x80]), computeNameHash('AA'));
      expect(result.matches).toBe(true);
      expect(result.isAscii).toBe(true);
      expect(result.subject).toBe('<2 bytes>');
    });

    test('should describe non-ASCII names by size', () => {
      const result = new TypeHashVerifier().verifyAsciiName(new Uint8Array([0xc3, 0xa9]), 1023105693);
      expect(result).toEqual({
        matches: true,
        expected: 1023105693,
        actual: 1023105693,
        subject: '<2 bytes>',
        isAscii: false,
      });
    });
  });
});
