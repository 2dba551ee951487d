import path from 'path';
import { loadEnv } from './defaults';
import { loadDigestConfig, type ConfigWarning } from './loader';
import type { LogLevel } from '../shared/logger';

export { loadEnv } from './defaults';
export type { EnvConfig } from './defaults';
export type { LogLevel } from '../shared/logger';
export { loadDigestConfig, CONFIG_DEFAULTS, DEFAULT_CONFIG_PATH } from './loader';
export type { ConfigWarning, LoadConfigResult, DigestFileConfig } from './loader';
export { digestConfigSchema } from './schema';

/**
 * Runtime configuration handed to the claim queue and job runner at construction.
 * Directory and ledger paths are absolute.
 */
export interface WorkerConfig {
  inputDir: string;
  outputDir: string;
  ledgerPath: string;
  pollIntervalMs: number;
  serviceTimeoutMs: number;
  itemExtension: string;
  claimExtension: string;
  logLevel: LogLevel;
  llm: {
    apiKey: string | null;
    model: string;
    maxTokens: number;
    temperature: number;
  };
}

export interface ConfigOverrides {
  configPath?: string;
  inputDir?: string;
  outputDir?: string;
  ledgerPath?: string;
  pollIntervalMs?: number;
  serviceTimeoutMs?: number;
}

export interface ResolvedConfig {
  config: WorkerConfig;
  warnings: ConfigWarning[];
}

/**
 * Merge environment, config file and CLI overrides (highest precedence) into a WorkerConfig.
 */
export function resolveWorkerConfig(
  overrides: ConfigOverrides = {},
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd(),
): ResolvedConfig {
  const envConfig = loadEnv(env);
  const { config: file, warnings } = loadDigestConfig(
    path.resolve(cwd, overrides.configPath ?? envConfig.config_path),
  );

  return {
    config: {
      inputDir: path.resolve(cwd, overrides.inputDir ?? file.input_location),
      outputDir: path.resolve(cwd, overrides.outputDir ?? file.output_location),
      ledgerPath: path.resolve(cwd, overrides.ledgerPath ?? file.ledger_location),
      pollIntervalMs: overrides.pollIntervalMs ?? file.poll_interval_ms,
      serviceTimeoutMs: overrides.serviceTimeoutMs ?? file.service_timeout_ms,
      itemExtension: file.queue.extension,
      claimExtension: file.queue.claim_extension,
      logLevel: envConfig.log_level,
      llm: {
        apiKey: envConfig.anthropic_api_key,
        model: file.llm.model,
        maxTokens: file.llm.max_tokens,
        temperature: file.llm.temperature,
      },
    },
    warnings,
  };
}
