import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema, type Config, type ConfigInput } from '@copyhead/shared';

export const CONFIG_ENV = 'COPYHEAD_CONFIG';
export const GLOBAL_IGNORE_ENV = 'COPYHEAD_GLOBAL_IGNORE';
export const REPO_CONFIG_FILE = '.copyhead.yaml';

type RawConfig = Record<string, unknown>;

export interface ConfigOptions {
  configPath?: string; // --config
  flags?: ConfigInput; // CLI flags
  cwd?: string; // Workspace root (for repo config)
  env?: NodeJS.ProcessEnv;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Keys holding paths that are resolved against the directory of the file setting them */
function resolvePaths(raw: RawConfig, baseDir: string): RawConfig {
  const output = { ...raw };
  if (typeof output.globalIgnoreFile === 'string') {
    output.globalIgnoreFile = path.resolve(baseDir, output.globalIgnoreFile);
  }
  const template = output.template;
  if (isRecord(template) && typeof template.path === 'string') {
    output.template = { ...template, path: path.resolve(baseDir, template.path) };
  }
  return output;
}

export class ConfigLoader {
  static loadYaml(filePath: string): RawConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(filePath, 'utf8'));
    } catch (error: unknown) {
      if (error instanceof yaml.YAMLException) {
        throw new ConfigError(`Error parsing YAML file: ${filePath}\n${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Config file must contain a mapping: ${filePath}`);
    }
    return resolvePaths(parsed, path.dirname(filePath));
  }

  static mergeConfigs(target: RawConfig, source: RawConfig): RawConfig {
    const output = { ...target };
    for (const [key, sourceValue] of Object.entries(source)) {
      if (sourceValue === undefined) {
        continue;
      }
      const targetValue = output[key];
      if (isRecord(sourceValue) && isRecord(targetValue)) {
        output[key] = this.mergeConfigs(targetValue, sourceValue);
      } else {
        // Arrays and primitives replace
        output[key] = sourceValue;
      }
    }
    return output;
  }

  /**
   * Flags merge like any other source, except that ignore patterns and
   * excluded extensions add to what the files configured.
   */
  static applyFlags(merged: RawConfig, flags: ConfigInput, cwd: string): RawConfig {
    const { ignore, extensions, ...rest } = flags;
    let output = this.mergeConfigs(merged, resolvePaths(rest, cwd));

    if (ignore !== undefined) {
      output.ignore = Array.isArray(output.ignore) ? [...output.ignore, ...ignore] : ignore;
    }
    if (extensions !== undefined) {
      const current = isRecord(output.extensions) ? output.extensions : {};
      const next: RawConfig = { ...current };
      if (extensions.include !== undefined) {
        next.include = extensions.include;
      }
      if (extensions.exclude !== undefined) {
        next.exclude = Array.isArray(current.exclude)
          ? [...current.exclude, ...extensions.exclude]
          : extensions.exclude;
      }
      output = { ...output, extensions: next };
    }
    return output;
  }

  static load(options: ConfigOptions = {}): Config {
    const cwd = options.cwd || process.cwd();
    const env = options.env || process.env;

    // 1. User config: ~/.copyhead/config.yaml
    const userConfig = this.loadYaml(path.join(os.homedir(), '.copyhead', 'config.yaml'));

    // 2. Repo config: <workspace>/.copyhead.yaml
    const repoConfig = this.loadYaml(path.join(cwd, REPO_CONFIG_FILE));

    // 3. File named by the environment
    const envPath = env[CONFIG_ENV];
    const envConfig = envPath ? this.loadRequired(path.resolve(cwd, envPath)) : {};

    // 4. Explicit --config file
    const explicitConfig = options.configPath
      ? this.loadRequired(path.resolve(cwd, options.configPath))
      : {};

    // Precedence: flags > explicit > env > repo > user
    let merged = this.mergeConfigs({}, userConfig);
    merged = this.mergeConfigs(merged, repoConfig);
    merged = this.mergeConfigs(merged, envConfig);
    merged = this.mergeConfigs(merged, explicitConfig);
    merged = this.applyFlags(merged, options.flags ?? {}, cwd);

    const globalIgnore = env[GLOBAL_IGNORE_ENV];
    if (merged.globalIgnoreFile === undefined && globalIgnore) {
      merged.globalIgnoreFile = path.resolve(cwd, globalIgnore);
    }

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      const issues = result.error.issues
        .map((i) => `- ${i.path.join('.')}: ${i.message}`)
        .join('\n');
      throw new ConfigError(`Configuration validation failed:\n${issues}`);
    }
    return result.data;
  }

  private static loadRequired(filePath: string): RawConfig {
    if (!fs.existsSync(filePath)) {
      throw new ConfigError(`Config file not found: ${filePath}`);
    }
    return this.loadYaml(filePath);
  }
}
