import { z } from 'zod';
import { INT32_MAX } from './utils/bits';
import type { MethodDescriptor, TypeDescriptor } from './types';

// --- Scalars ---

export const ArrayRankSchema = z.number().int().min(1).max(INT32_MAX);

export const SignatureVariableIndexSchema = z.number().int().min(0).max(INT32_MAX);

export const AsciiNameHashModeSchema = z.enum(['corrected', 'legacy']);

// --- Descriptors ---

export const TypeDescriptorSchema: z.ZodType<TypeDescriptor> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({
      kind: z.literal('named'),
      name: z.string(),
    }),
    z.object({
      kind: z.literal('array'),
      element: TypeDescriptorSchema,
      rank: ArrayRankSchema,
    }),
    z.object({
      kind: z.literal('pointer'),
      pointee: TypeDescriptorSchema,
    }),
    z.object({
      kind: z.literal('byref'),
      parameter: TypeDescriptorSchema,
    }),
    z.object({
      kind: z.literal('nested'),
      enclosing: TypeDescriptorSchema,
      name: z.string(),
    }),
    z.object({
      kind: z.literal('genericInstance'),
      definition: TypeDescriptorSchema,
      arguments: z.array(TypeDescriptorSchema),
    }),
    z.object({
      kind: z.literal('signatureVariable'),
      index: SignatureVariableIndexSchema,
      method: z.boolean(),
    }),
  ])
);

export const MethodDescriptorSchema: z.ZodType<MethodDescriptor> = z.object({
  owner: TypeDescriptorSchema,
  name: z.string(),
  genericArguments: z.array(TypeDescriptorSchema).optional(),
});
