import { rotateLeft, toInt32, toUint32, formatHash, isHashCode, INT32_MIN, INT32_MAX, UINT32_MAX } from './utils/bits';
import { computeNameHash, computeAsciiNameHash } from './NameHash';
import type { AsciiNameHashOptions } from './NameHash';
import {
  computeArrayTypeHash,
  computePointerTypeHash,
  computeByrefTypeHash,
  computeNestedTypeHash,
  computeGenericInstanceHash,
  computeMethodHash,
  computeSignatureVariableHash,
  arrayBaseNameHash,
  SZ_ARRAY_NAME_HASH,
} from './TypeHashingAlgorithms';
import { ASCII_NAME_HASH_VERSION, resolveHashCode } from './types';
import type {
  Hashable,
  HashSource,
  AsciiNameHashMode,
  AsciiNameHashResult,
  TypeDescriptor,
  TypeDescriptorKind,
  NamedTypeDescriptor,
  ArrayTypeDescriptor,
  PointerTypeDescriptor,
  ByrefTypeDescriptor,
  NestedTypeDescriptor,
  GenericInstanceTypeDescriptor,
  SignatureVariableDescriptor,
  MethodDescriptor,
} from './types';

// Bit primitives
export { rotateLeft, toInt32, toUint32, formatHash, isHashCode, INT32_MIN, INT32_MAX, UINT32_MAX };

// Name hashing
export { computeNameHash, computeAsciiNameHash, ASCII_NAME_HASH_VERSION };
export type { AsciiNameHashOptions, AsciiNameHashMode, AsciiNameHashResult };

// Type hash combinators
export {
  computeArrayTypeHash,
  computePointerTypeHash,
  computeByrefTypeHash,
  computeNestedTypeHash,
  computeGenericInstanceHash,
  computeMethodHash,
  computeSignatureVariableHash,
  arrayBaseNameHash,
  SZ_ARRAY_NAME_HASH,
  resolveHashCode,
};
export type { Hashable, HashSource };

// Descriptors
export {
  computeTypeDescriptorHash,
  computeMethodDescriptorHash,
  parseTypeDescriptor,
  parseMethodDescriptor,
  formatTypeDescriptor,
  formatMethodDescriptor,
} from './TypeDescriptor';
export type {
  TypeDescriptor,
  TypeDescriptorKind,
  NamedTypeDescriptor,
  ArrayTypeDescriptor,
  PointerTypeDescriptor,
  ByrefTypeDescriptor,
  NestedTypeDescriptor,
  GenericInstanceTypeDescriptor,
  SignatureVariableDescriptor,
  MethodDescriptor,
};
export {
  TypeDescriptorSchema,
  MethodDescriptorSchema,
  ArrayRankSchema,
  SignatureVariableIndexSchema,
  AsciiNameHashModeSchema,
} from './schemas';

// Verification
export { TypeHashVerifier } from './HashVerifier';
export type { HashVerificationResult, AsciiNameVerificationResult, AsciiNameVerifyOptions } from './HashVerifier';

// Configuration
export { validateEnv, loadTypeHashingConfig, DEFAULT_TYPE_HASHING_CONFIG } from './config';
export type { EnvConfig, TypeHashingConfig } from './config';

// Errors
export { TypeHashError, InvalidArgumentError, TypeHashConfigError } from './errors';

// Logging
export { logger, resolveLogLevel } from './utils/logger';
export type { Logger } from './utils/logger';
