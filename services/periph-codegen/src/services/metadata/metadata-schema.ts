/**
 * Descriptor document schemas.
 *
 * Documents are written in snake_case; the store maps them onto the camelCase
 * descriptor types after validation.
 */

import { z } from 'zod';

const identifier = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'identifier');

/** Non-negative integer given as a number or a `0x`/decimal string. */
export const AddressSchema = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^(0[xX][0-9A-Fa-f]+|\d+)[uU]?$/, 'hex or decimal address')
    .transform((value) => Number(value.replace(/[uU]$/, ''))),
]);

const ConstantValueSchema = z.union([z.number(), z.string(), z.boolean()]);

const TemplateParamSchema = z.object({
  name: identifier,
  type: z.string().min(1),
});

const ConstantSchema = z.object({
  name: identifier,
  type: z.string().min(1),
  value: ConstantValueSchema,
});

const MethodParameterSchema = z.object({
  name: identifier,
  type: z.string().min(1),
  default: ConstantValueSchema.optional(),
});

const PolicyMethodSchema = z.object({
  description: z.string(),
  parameters: z.array(MethodParameterSchema),
  return_type: z.string().min(1),
  code: z.string(),
  test_hook: identifier.optional(),
});

const InstanceSchema = z.object({
  name: identifier,
  base: AddressSchema,
  clock: AddressSchema.optional(),
  params: z.record(ConstantValueSchema).optional(),
});

const DeclaredFieldSchema = z
  .object({
    offset: z.number().int().min(0).max(63),
    width: z.number().int().min(1).max(64),
  })
  .refine((field) => field.offset + field.width <= 64, { message: 'field must end at or below bit 63' });

const DeclaredRegisterSchema = z.object({
  offset: AddressSchema,
  fields: z.record(DeclaredFieldSchema).optional(),
});

export const PeripheralDocumentSchema = z
  .object({
    family: z.string().min(1),
    vendor: z.string().min(1),
    peripheral_name: identifier,
    description: z.string().optional(),
    register_include: z.string().min(1).optional(),
    template_params: z.array(TemplateParamSchema),
    constants: z.array(ConstantSchema),
    policy_methods: z.record(identifier, PolicyMethodSchema),
    instances: z.array(InstanceSchema),
    registers: z.record(identifier, DeclaredRegisterSchema).optional(),
  })
  .strict();

export const VendorDocumentSchema = z
  .object({
    vendor: z.string().min(1),
    description: z.string().optional(),
    constants: z.array(ConstantSchema).default([]),
  })
  .strict();

export const FamilyDocumentSchema = z
  .object({
    vendor: z.string().min(1),
    family: z.string().min(1),
    description: z.string().optional(),
    constants: z.array(ConstantSchema).default([]),
  })
  .strict();

export type PeripheralDocument = z.infer<typeof PeripheralDocumentSchema>;
export type VendorDocument = z.infer<typeof VendorDocumentSchema>;
export type FamilyDocument = z.infer<typeof FamilyDocumentSchema>;
