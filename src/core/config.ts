import { readFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { VoxConfigSchema, type VoxConfig, type VoxConfigOverrides } from './types.js';
import { ConfigError, toError } from './errors.js';

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager {
  private config: VoxConfig | null = null;
  private globalDir: string;
  private projectDir: string;

  constructor(projectDir?: string, globalDir?: string) {
    this.globalDir = globalDir ?? join(homedir(), '.voxbridge');
    this.projectDir = projectDir || process.cwd();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- global config <- project config <- env vars <- overrides
   */
  load(overrides?: VoxConfigOverrides): VoxConfig {
    let raw: RawConfig = {};

    raw = this.deepMerge(raw, this.readYaml(join(this.globalDir, 'config.yaml'), 'global'));
    raw = this.deepMerge(raw, this.readYaml(join(this.projectDir, '.voxbridge.yaml'), 'project'));
    raw = this.applyEnvVars(raw);

    if (overrides) {
      raw = this.deepMerge(raw, overrides);
    }

    const result = VoxConfigSchema.safeParse(raw);
    if (!result.success) {
      const detail = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigError(`Invalid configuration: ${detail}`, result.error);
    }

    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): VoxConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getProjectDir(): string {
    return this.projectDir;
  }

  ensureDirectories(): void {
    for (const dir of [this.globalDir, join(this.globalDir, 'logs')]) {
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }
  }

  private readYaml(path: string, label: string): RawConfig {
    if (!existsSync(path)) return {};

    let parsed: unknown;
    try {
      parsed = parseYaml(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigError(`Failed to parse ${label} config at ${path}`, toError(err));
    }
    return isRecord(parsed) ? parsed : {};
  }

  private applyEnvVars(raw: RawConfig): RawConfig {
    const env: RawConfig = {};

    if (process.env.VOXBRIDGE_SOCKET_PATH) {
      env.service = { socketPath: process.env.VOXBRIDGE_SOCKET_PATH };
    }
    if (process.env.VOXBRIDGE_ENGINE) {
      env.transcription = { engine: process.env.VOXBRIDGE_ENGINE };
    }
    if (process.env.VOXBRIDGE_LOG_LEVEL) {
      env.logging = { level: process.env.VOXBRIDGE_LOG_LEVEL };
    }
    if (process.env.OPENAI_API_KEY) {
      env.openaiApiKey = process.env.OPENAI_API_KEY;
    }

    return this.deepMerge(raw, env);
  }

  private deepMerge(target: RawConfig, source: RawConfig): RawConfig {
    const result = { ...target };
    for (const key of Object.keys(source)) {
      const incoming = source[key];
      const existing = target[key];
      if (incoming === undefined) continue;
      if (isRecord(incoming) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, incoming);
      } else {
        result[key] = incoming;
      }
    }
    return result;
  }
}
