import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { load as loadYaml } from 'js-yaml';
import { minimatch } from 'minimatch';
import { type Config, ConfigSchema, DEFAULT_PROVIDERS } from '../parser/config-schema.ts';
import { ConfigError } from '../runner/errors.ts';

export const CONFIG_DIR = '.promptcheck';
const CONFIG_FILES = ['config.yaml', 'config.yml'];

/**
 * Replace `${NAME}` references with values from the environment.
 * Unset variables become empty strings.
 */
export function interpolateEnv(
  content: string,
  env: Readonly<Record<string, string | undefined>> = process.env
): string {
  return content.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '');
}

/**
 * Provider name for a model: an explicit `provider:model` prefix, then
 * `model_mappings` globs in declaration order, then `default_provider`.
 */
export function providerForModel(config: Config, model: string): string {
  const separator = model.indexOf(':');
  if (separator > 0) {
    const prefix = model.slice(0, separator);
    if (Object.hasOwn(config.providers, prefix)) {
      return prefix;
    }
  }

  for (const [pattern, provider] of Object.entries(config.model_mappings)) {
    if (minimatch(model, pattern)) {
      return provider;
    }
  }

  return config.default_provider;
}

export class ConfigLoader {
  private static config: Config | null = null;

  /**
   * Load `.promptcheck/config.yaml` from the project directory, once per process.
   * A missing file yields the defaults.
   */
  static load(projectDir: string = process.cwd()): Config {
    if (ConfigLoader.config) {
      return ConfigLoader.config;
    }

    const path = CONFIG_FILES.map((file) => join(projectDir, CONFIG_DIR, file)).find((candidate) =>
      existsSync(candidate)
    );

    let raw: unknown = {};
    if (path) {
      try {
        raw = loadYaml(interpolateEnv(readFileSync(path, 'utf8'))) ?? {};
      } catch (error) {
        throw new ConfigError(error instanceof Error ? error.message : String(error), path);
      }
    }

    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError(issues.join('; '), path ?? CONFIG_DIR);
    }

    // Built-in providers stay available next to the ones the file declares
    ConfigLoader.config = {
      ...result.data,
      providers: { ...DEFAULT_PROVIDERS, ...result.data.providers },
    };
    return ConfigLoader.config;
  }

  static setConfig(config: Config): void {
    ConfigLoader.config = config;
  }

  static clear(): void {
    ConfigLoader.config = null;
  }

  static getProviderForModel(model: string): string {
    return providerForModel(ConfigLoader.load(), model);
  }
}
