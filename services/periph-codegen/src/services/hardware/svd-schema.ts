/**
 * Shape of a CMSIS SVD document as produced by xml2js with `explicitArray`.
 * Every element is an array; attributes live under `$`. Only the elements the
 * importer reads are listed, everything else is stripped.
 */

import { z } from 'zod';

type Text = string[];

interface Attributes {
  derivedFrom?: string;
}

/** Empty container elements (`<fields/>`) come back as '' from xml2js. */
type Container<T> = (T | string)[];

export interface RawField {
  $?: Attributes;
  name: Text;
  bitOffset?: Text;
  bitWidth?: Text;
  bitRange?: Text;
  lsb?: Text;
  msb?: Text;
  access?: Text;
}

export interface RawRegister {
  $?: Attributes;
  name: Text;
  addressOffset: Text;
  size?: Text;
  access?: Text;
  resetValue?: Text;
  dim?: Text;
  dimIncrement?: Text;
  dimIndex?: Text;
  fields?: Container<{ field?: RawField[] }>;
}

export interface RawCluster {
  $?: Attributes;
  name: Text;
  addressOffset: Text;
  size?: Text;
  access?: Text;
  resetValue?: Text;
  dim?: Text;
  dimIncrement?: Text;
  dimIndex?: Text;
  register?: RawRegister[];
  cluster?: RawCluster[];
}

export interface RawRegisterBlock {
  register?: RawRegister[];
  cluster?: RawCluster[];
}

export interface RawPeripheral {
  $?: Attributes;
  name: Text;
  groupName?: Text;
  baseAddress?: Text;
  size?: Text;
  access?: Text;
  resetValue?: Text;
  registers?: Container<RawRegisterBlock>;
}

export interface RawDevice {
  name?: Text;
  size?: Text;
  access?: Text;
  resetValue?: Text;
  peripherals: Container<{ peripheral?: RawPeripheral[] }>;
}

export interface RawSvdDocument {
  device: RawDevice;
}

const text = z.array(z.string()).min(1);
const attributes = z.object({ derivedFrom: z.string().optional() }).optional();

function container<T>(schema: z.ZodType<T>): z.ZodType<Container<T>> {
  return z.array(z.union([schema, z.string()]));
}

const RawFieldSchema: z.ZodType<RawField> = z.object({
  $: attributes,
  name: text,
  bitOffset: text.optional(),
  bitWidth: text.optional(),
  bitRange: text.optional(),
  lsb: text.optional(),
  msb: text.optional(),
  access: text.optional(),
});

const RawRegisterSchema: z.ZodType<RawRegister> = z.object({
  $: attributes,
  name: text,
  addressOffset: text,
  size: text.optional(),
  access: text.optional(),
  resetValue: text.optional(),
  dim: text.optional(),
  dimIncrement: text.optional(),
  dimIndex: text.optional(),
  fields: container(z.object({ field: z.array(RawFieldSchema).optional() })).optional(),
});

const RawClusterSchema: z.ZodType<RawCluster> = z.lazy(() =>
  z.object({
    $: attributes,
    name: text,
    addressOffset: text,
    size: text.optional(),
    access: text.optional(),
    resetValue: text.optional(),
    dim: text.optional(),
    dimIncrement: text.optional(),
    dimIndex: text.optional(),
    register: z.array(RawRegisterSchema).optional(),
    cluster: z.array(RawClusterSchema).optional(),
  })
);

const RawPeripheralSchema: z.ZodType<RawPeripheral> = z.object({
  $: attributes,
  name: text,
  groupName: text.optional(),
  baseAddress: text.optional(),
  size: text.optional(),
  access: text.optional(),
  resetValue: text.optional(),
  registers: container(
    z.object({
      register: z.array(RawRegisterSchema).optional(),
      cluster: z.array(RawClusterSchema).optional(),
    })
  ).optional(),
});

export const RawSvdDocumentSchema: z.ZodType<RawSvdDocument> = z.object({
  device: z.object({
    name: text.optional(),
    size: text.optional(),
    access: text.optional(),
    resetValue: text.optional(),
    peripherals: container(z.object({ peripheral: z.array(RawPeripheralSchema).optional() })),
  }),
});

/** Drop the '' placeholders xml2js leaves for empty containers. */
export function elements<T extends object>(items: Container<T> | undefined): T[] {
  return (items ?? []).filter((item): item is T => typeof item !== 'string');
}
