import { InvalidArgumentError } from './errors';
import { computeNameHash } from './NameHash';
import { INT32_MAX, rotateLeft, toInt32 } from './utils/bits';
import { resolveHashCode } from './types';
import type { HashSource } from './types';

/**
 * Name hash of "System.Array`1". Single-dimensional arrays hash like the
 * generic type that implements them.
 */
export const SZ_ARRAY_NAME_HASH = toInt32(0xd5313557);

const POINTER_DISCRIMINATOR = 0x12d0;
const BYREF_DISCRIMINATOR = 0x4c85;

const METHOD_VARIABLE_MULTIPLIER = 0x7822381;
const METHOD_VARIABLE_OFFSET = 0x54872645;
const TYPE_VARIABLE_MULTIPLIER = 0x5498341;
const TYPE_VARIABLE_OFFSET = 0x832424;

/**
 * Name hash of the implementation type behind an array of the given rank.
 */
export function arrayBaseNameHash(rank: number): number {
  assertArrayRank(rank);
  return rank === 1 ? SZ_ARRAY_NAME_HASH : computeNameHash(`System.MDArrayRank${rank}\`1`);
}

export function computeArrayTypeHash(elementType: HashSource, rank: number): number {
  const elementHash = resolveHashCode(elementType, 'elementType');
  let hash = arrayBaseNameHash(rank);
  hash = (hash + rotateLeft(hash, 13)) ^ elementHash;
  return (hash + rotateLeft(hash, 15)) | 0;
}

export function computePointerTypeHash(pointeeType: HashSource): number {
  const hash = resolveHashCode(pointeeType, 'pointeeType');
  return (hash + rotateLeft(hash, 5)) ^ POINTER_DISCRIMINATOR;
}

export function computeByrefTypeHash(parameterType: HashSource): number {
  const hash = resolveHashCode(parameterType, 'parameterType');
  return (hash + rotateLeft(hash, 7)) ^ BYREF_DISCRIMINATOR;
}

/**
 * Hash of a type nested in `enclosingTypeHash`. Deeper nesting chains this
 * call from the outermost type inwards.
 */
export function computeNestedTypeHash(enclosingTypeHash: number, nestedTypeNameHash: number): number {
  const enclosing = resolveHashCode(enclosingTypeHash, 'enclosingTypeHash');
  const nestedName = resolveHashCode(nestedTypeNameHash, 'nestedTypeNameHash');
  return (enclosing + rotateLeft(enclosing, 11)) ^ nestedName;
}

/**
 * Fold the type argument hashes into the generic definition's hash, in order.
 */
export function computeGenericInstanceHash(
  genericDefinition: HashSource,
  typeArguments: readonly HashSource[]
): number {
  if (!Array.isArray(typeArguments)) {
    throw new InvalidArgumentError('typeArguments', typeArguments, 'expected an array of hash sources');
  }
  let hash = resolveHashCode(genericDefinition, 'genericDefinition');
  for (let i = 0; i < typeArguments.length; i++) {
    const argumentHash = resolveHashCode(typeArguments[i], `typeArguments[${i}]`);
    hash = (hash + rotateLeft(hash, 13)) ^ argumentHash;
  }
  return (hash + rotateLeft(hash, 15)) | 0;
}

/**
 * Hash of a method on the type with hash `typeHash`.
 *
 * @param nameOrNameAndGenericArgumentsHash name hash for a plain method, or the
 * generic instance hash of the name hash and the method's type arguments
 */
export function computeMethodHash(typeHash: number, nameOrNameAndGenericArgumentsHash: number): number {
  // Plain XOR is a weak combiner, but hashes already persisted depend on it.
  return (
    resolveHashCode(typeHash, 'typeHash') ^
    resolveHashCode(nameOrNameAndGenericArgumentsHash, 'nameOrNameAndGenericArgumentsHash')
  );
}

/**
 * Hash of a generic signature variable (`!index` for a type variable,
 * `!!index` for a method variable).
 */
export function computeSignatureVariableHash(index: number, isMethodVariable: boolean): number {
  if (!Number.isInteger(index) || index < 0 || index > INT32_MAX) {
    throw new InvalidArgumentError('index', index, `expected an integer in 0..${INT32_MAX}`);
  }
  if (typeof isMethodVariable !== 'boolean') {
    throw new InvalidArgumentError('isMethodVariable', isMethodVariable, 'expected a boolean');
  }
  return isMethodVariable
    ? (Math.imul(index, METHOD_VARIABLE_MULTIPLIER) + METHOD_VARIABLE_OFFSET) | 0
    : (Math.imul(index, TYPE_VARIABLE_MULTIPLIER) + TYPE_VARIABLE_OFFSET) | 0;
}

function assertArrayRank(rank: number): void {
  if (!Number.isInteger(rank) || rank < 1 || rank > INT32_MAX) {
    throw new InvalidArgumentError('rank', rank, `expected an integer in 1..${INT32_MAX}`);
  }
}
