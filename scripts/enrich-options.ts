import { isLanguageCode, type LanguageCode } from '../lib/enrichment/schemas';
import { isLlmProvider, type LlmProvider } from '../lib/llm/types';

export interface EnrichOptions {
  headword: string;
  sourceLanguage: LanguageCode;
  targetLanguage: LanguageCode;
  provider?: LlmProvider;
  model?: string;
  categories: string[];
  force: boolean;
  batchId?: string;
  tags: string[];
  enqueue: boolean;
}

export const USAGE =
  'Usage: enrich-word <headword> --source <lang> --target <lang> [--provider openai|deepseek|googleai] [--model <name>] [--category <c>]... [--force] [--batch-id <id>] [--tag <t>]... [--enqueue]';

const VALUE_FLAGS = ['source', 'target', 'provider', 'model', 'category', 'batch-id', 'tag'] as const;
type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return (VALUE_FLAGS as readonly string[]).includes(name);
}

function requireLanguage(flag: string, value: string | undefined): LanguageCode {
  if (!value) {
    throw new Error(`Missing required --${flag} argument`);
  }
  if (!isLanguageCode(value)) {
    throw new Error(`Invalid language code for --${flag}: "${value}"`);
  }
  return value;
}

export function parseEnrichArgs(argv: readonly string[]): EnrichOptions {
  const values = new Map<ValueFlag, string[]>();
  const positional: string[] = [];
  let force = false;
  let enqueue = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (!arg || arg === '--') continue;

    if (arg === '--force' || arg === '-f') {
      force = true;
      continue;
    }
    if (arg === '--enqueue') {
      enqueue = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    const [rawName, inlineValue] = arg.slice(2).split('=', 2);
    const name = rawName ?? '';
    if (!isValueFlag(name)) {
      throw new Error(`Unknown option: ${arg}`);
    }
    let value = inlineValue;
    if (value === undefined) {
      value = argv[index + 1];
      index += 1;
    }
    if (value === undefined || value.trim() === '') {
      throw new Error(`Missing value for --${name}`);
    }
    values.set(name, [...(values.get(name) ?? []), value.trim()]);
  }

  const headword = positional.join(' ').trim();
  if (!headword) {
    throw new Error('Missing headword');
  }

  const last = (flag: ValueFlag) => values.get(flag)?.at(-1);
  const provider = last('provider');
  if (provider !== undefined && !isLlmProvider(provider)) {
    throw new Error(`Unknown provider: "${provider}"`);
  }

  return {
    headword,
    sourceLanguage: requireLanguage('source', last('source')),
    targetLanguage: requireLanguage('target', last('target')),
    provider,
    model: last('model'),
    categories: values.get('category') ?? [],
    force,
    batchId: last('batch-id'),
    tags: values.get('tag') ?? [],
    enqueue,
  } satisfies EnrichOptions;
}
