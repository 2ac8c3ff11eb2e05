/**
 * Skill Runner (child process entry)
 *
 * Usage: node --import tsx skillRunner.ts <codeFile> <providerUrl> <agentAddress> <contractsJson> <timeoutMs>
 *
 * Loads the candidate module, calls executeSkill(providerUrl, agentAddress, deployedContracts)
 * and prints exactly one JSON envelope as the last stdout line. Everything the
 * candidate logs goes to stderr.
 */

import { resolve } from 'path';
import { fileURLToPath, pathToFileURL } from 'url';

export type RunnerErrorKind = 'timeout' | 'runtime' | 'entry_point' | 'protocol';

export type RunnerEnvelope =
  | { success: true; result: unknown }
  | { success: false; error: string; stack?: string; errorKind: RunnerErrorKind };

export interface SkillInput {
  providerUrl: string;
  agentAddress: string;
  deployedContracts: Record<string, string>;
}

type SkillEntry = (...args: unknown[]) => unknown;

function isSkillEntry(value: unknown): value is SkillEntry {
  return typeof value === 'function';
}

function findEntry(mod: unknown): SkillEntry | null {
  if (typeof mod !== 'object' || mod === null) return null;
  if ('executeSkill' in mod && isSkillEntry(mod.executeSkill)) {
    return mod.executeSkill;
  }
  if (!('default' in mod)) return null;
  const fallback = mod.default;
  // export default async function executeSkill(...)
  if (isSkillEntry(fallback)) {
    return fallback;
  }
  if (typeof fallback === 'object' && fallback !== null && 'executeSkill' in fallback && isSkillEntry(fallback.executeSkill)) {
    return fallback.executeSkill;
  }
  return null;
}

function runtimeFailure(error: unknown): RunnerEnvelope {
  if (error instanceof Error) {
    return { success: false, errorKind: 'runtime', error: error.message || error.name, stack: error.stack };
  }
  return { success: false, errorKind: 'runtime', error: String(error) };
}

/**
 * Run one skill module in this process with a timer racing the entry point.
 */
export async function runSkillModule(
  codeFile: string,
  input: SkillInput,
  timeoutMs: number
): Promise<RunnerEnvelope> {
  let mod: unknown;
  try {
    mod = await import(pathToFileURL(resolve(codeFile)).href);
  } catch (error) {
    return runtimeFailure(error);
  }

  const entry = findEntry(mod);
  if (!entry) {
    return {
      success: false,
      errorKind: 'entry_point',
      error: 'Module does not export an executeSkill function',
    };
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<RunnerEnvelope>((resolveTimeout) => {
    timer = setTimeout(() => {
      resolveTimeout({
        success: false,
        errorKind: 'timeout',
        error: `executeSkill did not settle within ${timeoutMs}ms`,
      });
    }, timeoutMs);
  });

  const run = Promise.resolve()
    .then(() => entry(input.providerUrl, input.agentAddress, input.deployedContracts))
    .then(
      (result): RunnerEnvelope => ({ success: true, result }),
      (error: unknown): RunnerEnvelope => runtimeFailure(error)
    );

  try {
    return await Promise.race([run, timeout]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
  }
}

/**
 * Serialize with bigint values as decimal strings.
 */
export function serializeEnvelope(envelope: RunnerEnvelope): string {
  const replacer = (_key: string, value: unknown) => (typeof value === 'bigint' ? value.toString() : value);
  try {
    return JSON.stringify(envelope, replacer);
  } catch (error) {
    return JSON.stringify({
      success: false,
      errorKind: 'runtime',
      error: `Result is not JSON-serializable: ${error instanceof Error ? error.message : String(error)}`,
    });
  }
}

function parseContracts(raw: string): Record<string, string> {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('deployed contracts must be a JSON object');
  }
  const contracts: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') contracts[key] = value;
  }
  return contracts;
}

function emit(envelope: RunnerEnvelope): void {
  process.stdout.write(`\n${serializeEnvelope(envelope)}\n`, () => process.exit(0));
}

async function main(): Promise<void> {
  // Only the envelope may reach stdout
  console.log = (...args: unknown[]) => console.error(...args);
  console.info = (...args: unknown[]) => console.error(...args);
  console.debug = (...args: unknown[]) => console.error(...args);

  const [codeFile, providerUrl, agentAddress, contractsJson, timeoutArg] = process.argv.slice(2);
  const timeoutMs = Number(timeoutArg);
  if (!codeFile || !providerUrl || !agentAddress || contractsJson === undefined || !Number.isFinite(timeoutMs)) {
    emit({
      success: false,
      errorKind: 'protocol',
      error: 'usage: skillRunner <codeFile> <providerUrl> <agentAddress> <contractsJson> <timeoutMs>',
    });
    return;
  }

  let deployedContracts: Record<string, string>;
  try {
    deployedContracts = parseContracts(contractsJson);
  } catch (error) {
    emit({ success: false, errorKind: 'protocol', error: `Invalid contracts JSON: ${String(error)}` });
    return;
  }

  emit(await runSkillModule(codeFile, { providerUrl, agentAddress, deployedContracts }, timeoutMs));
}

const invokedDirectly =
  process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (invokedDirectly) {
  main().catch((error: unknown) => {
    emit(runtimeFailure(error));
  });
}
