import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { GateConfigSchema, type GateConfig } from './types.js';
import { ConfigError } from './errors.js';

export const PROJECT_CONFIG_FILE = '.release-gate.yaml';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: GateConfig | null = null;
  private projectDir: string;
  private env: NodeJS.ProcessEnv;

  constructor(projectDir?: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectDir = projectDir || process.cwd();
    this.env = env;
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- project config <- env vars <- overrides
   */
  load(overrides?: RawConfig): GateConfig {
    let raw: RawConfig = {};

    const projectConfigPath = this.getConfigPath();
    if (existsSync(projectConfigPath)) {
      let parsed: unknown;
      try {
        parsed = parseYaml(readFileSync(projectConfigPath, 'utf-8'));
      } catch (err) {
        throw new ConfigError(
          `Failed to parse project config at ${projectConfigPath}`,
          err instanceof Error ? err : undefined,
        );
      }
      if (isRecord(parsed)) {
        raw = this.deepMerge(raw, parsed);
      }
    }

    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = GateConfigSchema.safeParse(raw);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${details}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  get(): GateConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  getConfigPath(): string {
    return join(this.projectDir, PROJECT_CONFIG_FILE);
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const result = { ...raw };

    if (this.env.OFFICIAL_REPO) {
      const repository = isRecord(result.repository) ? result.repository : {};
      result.repository = { ...repository, official: this.env.OFFICIAL_REPO };
    }
    if (this.env.TRAVIS_PYTHON_VERSION) {
      const conda = isRecord(result.conda) ? result.conda : {};
      result.conda = { ...conda, pythonVersion: this.env.TRAVIS_PYTHON_VERSION };
    }

    return result;
  }

  private deepMerge(target: RawConfig, source: object): RawConfig {
    const result = { ...target };
    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else if (value !== undefined) {
        result[key] = value;
      }
    }
    return result;
  }
}

/**
 * Name of the variable holding the docs deploy key for the official repository,
 * e.g. `pcdshub/pcdsdevices` -> DOCTR_DEPLOY_ENCRYPTION_KEY_PCDSHUB_PCDSDEVICES
 */
export function resolveDeployKeyVariable(config: GateConfig): string {
  if (config.docs.deployKeyVariable) {
    return config.docs.deployKeyVariable;
  }
  const slug = config.repository.official.toUpperCase().replace(/[^A-Z0-9]/g, '_');
  return `DOCTR_DEPLOY_ENCRYPTION_KEY_${slug}`;
}

export function resolveArtifactGlob(config: GateConfig): string {
  return config.publish.artifactGlob
    ?? `${config.conda.outputFolder}/${config.publish.platform}/*.tar.bz2`;
}

export function resolveLintGlobs(config: GateConfig): string[] {
  return config.tests.lintGlobs ?? [`${config.project.package}/*.py`];
}
