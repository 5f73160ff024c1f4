import type { z } from 'zod';
import { InvalidArgumentError } from './errors';
import { computeNameHash } from './NameHash';
import {
  computeArrayTypeHash,
  computeByrefTypeHash,
  computeGenericInstanceHash,
  computeMethodHash,
  computeNestedTypeHash,
  computePointerTypeHash,
  computeSignatureVariableHash,
} from './TypeHashingAlgorithms';
import { MethodDescriptorSchema, TypeDescriptorSchema } from './schemas';
import type { MethodDescriptor, TypeDescriptor } from './types';

/**
 * Hash a type descriptor, composing the combinators bottom-up.
 */
export function computeTypeDescriptorHash(descriptor: TypeDescriptor): number {
  switch (descriptor.kind) {
    case 'named':
      return computeNameHash(descriptor.name);
    case 'array':
      return computeArrayTypeHash(computeTypeDescriptorHash(descriptor.element), descriptor.rank);
    case 'pointer':
      return computePointerTypeHash(computeTypeDescriptorHash(descriptor.pointee));
    case 'byref':
      return computeByrefTypeHash(computeTypeDescriptorHash(descriptor.parameter));
    case 'nested':
      return computeNestedTypeHash(
        computeTypeDescriptorHash(descriptor.enclosing),
        computeNameHash(descriptor.name)
      );
    case 'genericInstance':
      return computeGenericInstanceHash(
        computeTypeDescriptorHash(descriptor.definition),
        descriptor.arguments.map(computeTypeDescriptorHash)
      );
    case 'signatureVariable':
      return computeSignatureVariableHash(descriptor.index, descriptor.method);
    default: {
      const exhaustive: never = descriptor;
      throw new InvalidArgumentError('descriptor', exhaustive, 'unknown descriptor kind');
    }
  }
}

/**
 * Hash a method. Generic method instantiations fold their type arguments into
 * the name hash before it is combined with the owner.
 */
export function computeMethodDescriptorHash(method: MethodDescriptor): number {
  const ownerHash = computeTypeDescriptorHash(method.owner);
  let nameHash = computeNameHash(method.name);
  if (method.genericArguments && method.genericArguments.length > 0) {
    nameHash = computeGenericInstanceHash(nameHash, method.genericArguments.map(computeTypeDescriptorHash));
  }
  return computeMethodHash(ownerHash, nameHash);
}

export function parseTypeDescriptor(input: unknown): TypeDescriptor {
  return parseWith(TypeDescriptorSchema, input, 'descriptor');
}

export function parseMethodDescriptor(input: unknown): MethodDescriptor {
  return parseWith(MethodDescriptorSchema, input, 'method');
}

// Ranks above this render as `[rank=N]` instead of N-1 commas.
const MAX_FORMATTED_RANK = 32;

/**
 * Render a descriptor in signature notation, e.g. `List`1<System.Int32>[]`.
 */
export function formatTypeDescriptor(descriptor: TypeDescriptor): string {
  switch (descriptor.kind) {
    case 'named':
      return descriptor.name;
    case 'array':
      return `${formatTypeDescriptor(descriptor.element)}${formatArrayRank(descriptor.rank)}`;
    case 'pointer':
      return `${formatTypeDescriptor(descriptor.pointee)}*`;
    case 'byref':
      return `${formatTypeDescriptor(descriptor.parameter)}&`;
    case 'nested':
      return `${formatTypeDescriptor(descriptor.enclosing)}+${descriptor.name}`;
    case 'genericInstance':
      return `${formatTypeDescriptor(descriptor.definition)}<${descriptor.arguments.map(formatTypeDescriptor).join(',')}>`;
    case 'signatureVariable':
      return `${descriptor.method ? '!!' : '!'}${descriptor.index}`;
    default: {
      const exhaustive: never = descriptor;
      throw new InvalidArgumentError('descriptor', exhaustive, 'unknown descriptor kind');
    }
  }
}

function formatArrayRank(rank: number): string {
  return rank > MAX_FORMATTED_RANK ? `[rank=${rank}]` : `[${','.repeat(rank - 1)}]`;
}

export function formatMethodDescriptor(method: MethodDescriptor): string {
  const args = method.genericArguments && method.genericArguments.length > 0
    ? `<${method.genericArguments.map(formatTypeDescriptor).join(',')}>`
    : '';
  return `${formatTypeDescriptor(method.owner)}.${method.name}${args}`;
}

function parseWith<T>(schema: z.ZodType<T>, input: unknown, argumentName: string): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((e) => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
      .join('; ');
    throw new InvalidArgumentError(argumentName, input, issues);
  }
  return result.data;
}
