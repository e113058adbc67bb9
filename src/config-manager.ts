import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_FILE_ATTRIBUTE, DEFAULT_PRODUCT_BATCH_SIZE, USER_LOB, USER_ROLE, USER_SEGMENT } from './constants';
import Logger, { getErrorMessage } from './logger';
import type { ReporterConfig } from './types';
import { reporterConfigShape } from './validators';

const CONFIG_FILE_NAME = 'config.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pick the known keys of a parsed config file, each checked by its own schema.
 * `healed` is true when anything was dropped or replaced by a default.
 */
export function mergeConfig(disk: unknown, defaults: ReporterConfig): { config: ReporterConfig; healed: boolean } {
  if (!isRecord(disk)) return { config: defaults, healed: true };

  const parsed = {
    userFilter: reporterConfigShape.userFilter.safeParse(disk.userFilter),
    seedRole: reporterConfigShape.seedRole.safeParse(disk.seedRole),
    delivery: reporterConfigShape.delivery.safeParse(disk.delivery),
    outputDir: reporterConfigShape.outputDir.safeParse(disk.outputDir),
    fileAttribute: reporterConfigShape.fileAttribute.safeParse(disk.fileAttribute),
    productBatchSize: reporterConfigShape.productBatchSize.safeParse(disk.productBatchSize)
  };

  const config: ReporterConfig = {
    userFilter: parsed.userFilter.success ? parsed.userFilter.data : defaults.userFilter,
    seedRole: parsed.seedRole.success ? parsed.seedRole.data : defaults.seedRole,
    delivery: parsed.delivery.success ? parsed.delivery.data : defaults.delivery,
    outputDir: parsed.outputDir.success ? parsed.outputDir.data : defaults.outputDir,
    fileAttribute: parsed.fileAttribute.success ? parsed.fileAttribute.data : defaults.fileAttribute,
    productBatchSize: parsed.productBatchSize.success ? parsed.productBatchSize.data : defaults.productBatchSize
  };

  let healed = false;
  for (const [key, result] of Object.entries(parsed)) {
    if (result.success) continue;
    healed = true;
    if (key in disk) Logger.warn(`Config key ${key} is invalid, using default`, result.error.issues.map((i) => i.message));
  }

  // Detect unknown top-level keys
  const known = new Set<string>(Object.keys(defaults));
  for (const key of Object.keys(disk)) {
    if (!known.has(key)) {
      Logger.warn(`Config key ${key} is not recognized, removing`);
      healed = true;
    }
  }

  return { config, healed };
}

class ConfigManager {
  private configPath: string;

  constructor(dataDir: string) {
    this.configPath = path.join(dataDir, CONFIG_FILE_NAME);
  }

  get path(): string {
    return this.configPath;
  }

  getDefaults(): ReporterConfig {
    return {
      userFilter: {
        segment: USER_SEGMENT.INSTITUTIONAL,
        lob: USER_LOB.DEFAULT,
        roles: [USER_ROLE.REGIONAL_MANAGER, USER_ROLE.HPR, USER_ROLE.ZONAL_HEAD]
      },
      seedRole: USER_ROLE.HPR,
      delivery: 'dataverse',
      outputDir: 'reports',
      fileAttribute: DEFAULT_FILE_ATTRIBUTE,
      productBatchSize: DEFAULT_PRODUCT_BATCH_SIZE
    };
  }

  /** Load config.json, writing defaults on first run and re-saving a healed file */
  loadConfig(): ReporterConfig {
    const defaults = this.getDefaults();
    if (!fs.existsSync(this.configPath)) {
      this.saveConfig(defaults);
      return defaults;
    }

    let disk: unknown;
    try {
      disk = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      Logger.error('Error loading config:', getErrorMessage(error));
      this.saveConfig(defaults);
      return defaults;
    }

    const { config, healed } = mergeConfig(disk, defaults);
    if (healed) this.saveConfig(config);
    return config;
  }

  /** Atomic write (temp file + rename) so an interrupted save never leaves half a file */
  saveConfig(config: ReporterConfig): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      const tmp = `${this.configPath}.tmp`;
      fs.writeFileSync(tmp, JSON.stringify(config, null, 2), 'utf8');
      fs.renameSync(tmp, this.configPath);
    } catch (error) {
      Logger.warn(`Could not save ${CONFIG_FILE_NAME}:`, getErrorMessage(error));
    }
  }
}

export default ConfigManager;
