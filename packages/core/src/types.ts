import { InvalidArgumentError } from './errors';
import { isHashCode, toInt32 } from './utils/bits';

/**
 * Anything that can produce its own 32-bit hash code, such as a type object
 * from a metadata model. Hash combinators call it instead of dispatching on a
 * type hierarchy.
 */
export interface Hashable {
  getHashCode(): number;
}

/**
 * A hash code, or a value that yields one.
 */
export type HashSource = number | Hashable;

/**
 * Result of hashing a byte buffer with the ASCII-detecting name hash.
 */
export interface AsciiNameHashResult {
  hash: number;
  isAscii: boolean;
}

/**
 * Which odd-byte read the ASCII name hash performs.
 * - `corrected`: reads byte i + 1, matching the UTF-16 name hash
 * - `legacy`: re-reads byte i, matching hashes persisted by older producers
 */
export type AsciiNameHashMode = 'corrected' | 'legacy';

/**
 * Format marker distinguishing the two ASCII name hash variants.
 */
export const ASCII_NAME_HASH_VERSION: Readonly<Record<AsciiNameHashMode, number>> = {
  legacy: 1,
  corrected: 2,
};

/**
 * Resolve a hash source to the signed form of its hash code.
 * Throws InvalidArgumentError when the number (or what the Hashable returns)
 * is not a 32-bit pattern.
 */
export function resolveHashCode(source: HashSource, argumentName: string): number {
  if (typeof source === 'number') {
    if (!isHashCode(source)) {
      throw new InvalidArgumentError(argumentName, source, 'expected a 32-bit integer hash code');
    }
    return toInt32(source);
  }
  if (source === null || typeof source !== 'object' || typeof source.getHashCode !== 'function') {
    throw new InvalidArgumentError(argumentName, source, 'expected a hash code or a Hashable');
  }
  const hash = source.getHashCode();
  if (!isHashCode(hash)) {
    throw new InvalidArgumentError(argumentName, hash, 'getHashCode() must return a 32-bit integer hash code');
  }
  return toInt32(hash);
}

// --- Descriptors ---

export interface NamedTypeDescriptor {
  kind: 'named';
  /** Full name, e.g. `System.Int32` or `System.Collections.Generic.List`1` */
  name: string;
}

export interface ArrayTypeDescriptor {
  kind: 'array';
  element: TypeDescriptor;
  rank: number;
}

export interface PointerTypeDescriptor {
  kind: 'pointer';
  pointee: TypeDescriptor;
}

export interface ByrefTypeDescriptor {
  kind: 'byref';
  parameter: TypeDescriptor;
}

export interface NestedTypeDescriptor {
  kind: 'nested';
  enclosing: TypeDescriptor;
  /** Simple name of the nested type */
  name: string;
}

export interface GenericInstanceTypeDescriptor {
  kind: 'genericInstance';
  definition: TypeDescriptor;
  arguments: TypeDescriptor[];
}

export interface SignatureVariableDescriptor {
  kind: 'signatureVariable';
  index: number;
  method: boolean;
}

/**
 * Structural description of a type as it appears in metadata signatures.
 */
export type TypeDescriptor =
  | NamedTypeDescriptor
  | ArrayTypeDescriptor
  | PointerTypeDescriptor
  | ByrefTypeDescriptor
  | NestedTypeDescriptor
  | GenericInstanceTypeDescriptor
  | SignatureVariableDescriptor;

export type TypeDescriptorKind = TypeDescriptor['kind'];

export interface MethodDescriptor {
  owner: TypeDescriptor;
  name: string;
  /** Method type arguments of an instantiated generic method */
  genericArguments?: TypeDescriptor[];
}
