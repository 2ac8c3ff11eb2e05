/**
 * Fixture manifest and Foundry artifact loading
 */

import { readFile } from 'fs/promises';
import { join } from 'path';
import { Abi as AbiSchema } from 'abitype/zod';
import type { Abi, Address, Hex } from 'viem';
import { isAddress, isHex, parseUnits } from 'viem';
import { z } from 'zod';
import { CatalogueError } from '../errors';
import type { FixtureRegistry } from '../types/harness';

const addressSchema = z
  .string()
  .refine((value) => isAddress(value), { message: 'invalid address' })
  .transform((value): Address => (isAddress(value) ? value : '0x'));

const FixtureArgSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('identity') }),
  z.object({ kind: z.literal('fixture'), key: z.string().min(1) }),
  z.object({ kind: z.literal('uint'), value: z.string().regex(/^\d+$/) }),
  z.object({
    kind: z.literal('units'),
    value: z.string().regex(/^\d+(\.\d+)?$/),
    decimals: z.number().int().min(0).max(36).default(18),
  }),
  z.object({ kind: z.literal('string'), value: z.string() }),
  z.object({ kind: z.literal('address'), value: addressSchema }),
  z.object({ kind: z.literal('bool'), value: z.boolean() }),
]);

export type FixtureArg = z.infer<typeof FixtureArgSchema>;

const FixtureEntrySchema = z.object({
  key: z.string().min(1),
  contract: z.string().min(1),
  args: z.array(FixtureArgSchema).default([]),
});

const SetupCallSchema = z.object({
  target: z.string().min(1),
  signature: z.string().min(1),
  args: z.array(FixtureArgSchema).default([]),
  value: z.string().regex(/^\d+$/).optional(),
});

const FixtureManifestSchema = z.object({
  fixtures: z.array(FixtureEntrySchema).min(1),
  setup: z.array(SetupCallSchema).default([]),
  external: z.record(z.string(), addressSchema).default({}),
});

export type FixtureManifest = z.infer<typeof FixtureManifestSchema>;

export interface ContractArtifact {
  abi: Abi;
  bytecode: Hex;
}

export type ArtifactLoader = (contract: string) => Promise<ContractArtifact>;

const FoundryArtifactSchema = z.object({
  abi: AbiSchema,
  bytecode: z.object({
    object: z
      .string()
      .refine((value) => isHex(value) && value.length > 2, { message: 'empty or non-hex bytecode' })
      .transform((value): Hex => (isHex(value) ? value : '0x')),
  }),
});

export function parseFixtureManifest(raw: unknown, source = 'fixture manifest'): FixtureManifest {
  const parsed = FixtureManifestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new CatalogueError(source, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
  }

  const seen = new Set<string>(Object.keys(parsed.data.external));
  for (const entry of parsed.data.fixtures) {
    if (seen.has(entry.key)) {
      throw new CatalogueError(source, `duplicate fixture key "${entry.key}"`);
    }
    for (const arg of entry.args) {
      if (arg.kind === 'fixture' && !seen.has(arg.key)) {
        throw new CatalogueError(source, `fixture "${entry.key}" references "${arg.key}" before it is deployed`);
      }
    }
    seen.add(entry.key);
  }
  for (const call of parsed.data.setup) {
    if (!seen.has(call.target)) {
      throw new CatalogueError(source, `setup call targets unknown fixture "${call.target}"`);
    }
  }
  return parsed.data;
}

export async function loadFixtureManifest(path: string): Promise<FixtureManifest> {
  const text = await readFile(path, 'utf8');
  return parseFixtureManifest(JSON.parse(text), path);
}

/**
 * Loader for Foundry build output: <artifactsDir>/<Name>.sol/<Name>.json
 */
export function foundryArtifactLoader(artifactsDir: string): ArtifactLoader {
  return async (contract) => {
    const path = join(artifactsDir, `${contract}.sol`, `${contract}.json`);
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(path, 'utf8'));
    } catch (error) {
      throw new CatalogueError(path, `cannot read artifact (run "forge build" in contracts/): ${error instanceof Error ? error.message : error}`);
    }
    const parsed = FoundryArtifactSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CatalogueError(path, parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '));
    }
    return { abi: parsed.data.abi, bytecode: parsed.data.bytecode.object };
  };
}

export function resolveFixtureArg(
  arg: FixtureArg,
  identity: Address,
  deployed: FixtureRegistry
): bigint | string | boolean {
  switch (arg.kind) {
    case 'identity':
      return identity;
    case 'fixture': {
      const address = deployed[arg.key];
      if (!address) {
        throw new Error(`fixture "${arg.key}" is not deployed`);
      }
      return address;
    }
    case 'uint':
      return BigInt(arg.value);
    case 'units':
      return parseUnits(arg.value, arg.decimals);
    case 'string':
    case 'address':
    case 'bool':
      return arg.value;
  }
}
