import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';
import { digestConfigSchema, DEFAULT_CLAIM_EXTENSION, DEFAULT_ITEM_EXTENSION } from './schema';

export type DigestConfigFile = z.infer<typeof digestConfigSchema>;

export interface DigestFileConfig {
  input_location: string;
  output_location: string;
  ledger_location: string;
  poll_interval_ms: number;
  service_timeout_ms: number;
  queue: {
    extension: string;
    claim_extension: string;
  };
  llm: {
    model: string;
    max_tokens: number;
    temperature: number;
  };
}

export interface ConfigWarning {
  field: string;
  message: string;
}

export interface LoadConfigResult {
  config: DigestFileConfig;
  warnings: ConfigWarning[];
}

export const DEFAULT_CONFIG_PATH = '.transcript-digest.yml';

/** Values used when the file is absent or fields are omitted. */
export const CONFIG_DEFAULTS: DigestFileConfig = {
  input_location: 'input',
  output_location: 'output',
  ledger_location: 'logs/metrics.csv',
  poll_interval_ms: 2000,
  service_timeout_ms: 60_000,
  queue: {
    extension: DEFAULT_ITEM_EXTENSION,
    claim_extension: DEFAULT_CLAIM_EXTENSION,
  },
  llm: {
    model: 'claude-sonnet-4-20250514',
    max_tokens: 1024,
    temperature: 0.1,
  },
};

/** Known top-level keys for "did you mean?" suggestions. */
const KNOWN_KEYS = [
  'input_location',
  'output_location',
  'ledger_location',
  'poll_interval_ms',
  'service_timeout_ms',
  'queue',
  'llm',
];

/**
 * Load and validate a .transcript-digest.yml configuration file.
 * Never throws: problems become warnings and the affected fields keep their defaults.
 *
 * - Missing or empty file → defaults
 * - Invalid YAML or a non-mapping document → E501 warning + defaults
 * - Invalid values → E502 warning, field default
 * - Unknown keys → E502 warning with "did you mean?", key ignored
 */
export function loadDigestConfig(filePath: string = DEFAULT_CONFIG_PATH): LoadConfigResult {
  const warnings: ConfigWarning[] = [];

  let rawContent: string;
  try {
    rawContent = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return { config: withDefaults({}), warnings };
  }

  if (rawContent.trim() === '') {
    return { config: withDefaults({}), warnings };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(rawContent);
  } catch (err) {
    warnings.push({
      field: '_yaml',
      message: `E501: Invalid YAML syntax: ${err instanceof Error ? err.message : 'Unknown error'}. Using defaults.`,
    });
    return { config: withDefaults({}), warnings };
  }

  // Comments-only documents parse to null
  if (parsed === null || parsed === undefined) {
    return { config: withDefaults({}), warnings };
  }

  if (!isPlainObject(parsed)) {
    warnings.push({
      field: '_yaml',
      message: 'E501: Config must be a YAML mapping. Using defaults.',
    });
    return { config: withDefaults({}), warnings };
  }

  const result = digestConfigSchema.safeParse(parsed);
  if (result.success) {
    return { config: withDefaults(result.data), warnings };
  }

  const cleaned = structuredClone(parsed);
  for (const issue of result.error.issues) {
    const fieldPath = issue.path.join('.');
    if (issue.code === 'unrecognized_keys') {
      for (const key of issue.keys) {
        const suggestion = issue.path.length === 0 ? findSimilarKey(key) : null;
        warnings.push({
          field: fieldPath ? `${fieldPath}.${key}` : key,
          message: suggestion
            ? `E502: Unknown key "${key}". Did you mean "${suggestion}"?`
            : `E502: Unknown key "${key}".`,
        });
        removePath(cleaned, [...issue.path, key]);
      }
    } else {
      warnings.push({
        field: fieldPath || '_unknown',
        message: `E502: ${issue.message}. Using default for this field.`,
      });
      removePath(cleaned, issue.path);
    }
  }

  const retryResult = digestConfigSchema.safeParse(cleaned);
  if (retryResult.success) {
    return { config: withDefaults(retryResult.data), warnings };
  }

  return { config: withDefaults({}), warnings };
}

function withDefaults(file: DigestConfigFile): DigestFileConfig {
  return {
    input_location: file.input_location ?? CONFIG_DEFAULTS.input_location,
    output_location: file.output_location ?? CONFIG_DEFAULTS.output_location,
    ledger_location: file.ledger_location ?? CONFIG_DEFAULTS.ledger_location,
    poll_interval_ms: file.poll_interval_ms ?? CONFIG_DEFAULTS.poll_interval_ms,
    service_timeout_ms: file.service_timeout_ms ?? CONFIG_DEFAULTS.service_timeout_ms,
    queue: {
      extension: file.queue?.extension ?? CONFIG_DEFAULTS.queue.extension,
      claim_extension: file.queue?.claim_extension ?? CONFIG_DEFAULTS.queue.claim_extension,
    },
    llm: {
      model: file.llm?.model ?? CONFIG_DEFAULTS.llm.model,
      max_tokens: file.llm?.max_tokens ?? CONFIG_DEFAULTS.llm.max_tokens,
      temperature: file.llm?.temperature ?? CONFIG_DEFAULTS.llm.temperature,
    },
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Delete the value at `path`. An empty path or a missing parent is a no-op. */
function removePath(root: Record<string, unknown>, path: ReadonlyArray<string | number>): void {
  if (path.length === 0) return;
  let node: unknown = root;
  for (const segment of path.slice(0, -1)) {
    if (!isPlainObject(node)) return;
    node = node[String(segment)];
  }
  if (isPlainObject(node)) {
    delete node[String(path[path.length - 1])];
  }
}

function findSimilarKey(key: string): string | null {
  const lower = key.toLowerCase();
  for (const known of KNOWN_KEYS) {
    if (levenshtein(lower, known) <= 3) {
      return known;
    }
  }
  return null;
}

function levenshtein(a: string, b: string): number {
  const m = a.length;
  const n = b.length;
  const dp: number[][] = Array.from({ length: m + 1 }, () => Array<number>(n + 1).fill(0));

  for (let i = 0; i <= m; i++) dp[i][0] = i;
  for (let j = 0; j <= n; j++) dp[0][j] = j;

  for (let i = 1; i <= m; i++) {
    for (let j = 1; j <= n; j++) {
      dp[i][j] =
        a[i - 1] === b[j - 1]
          ? dp[i - 1][j - 1]
          : 1 + Math.min(dp[i - 1][j], dp[i][j - 1], dp[i - 1][j - 1]);
    }
  }

  return dp[m][n];
}
