import { cosmiconfigSync } from 'cosmiconfig';

export type OutputFormat = 'text' | 'json';

export interface EreaderFwConfig {
  maxDepth: number;
  maxCount: number;
  chunkSize: number;
  format: OutputFormat;
}

export const defaultConfig: EreaderFwConfig = {
  maxDepth: 8,
  maxCount: 4096,
  chunkSize: 8192,
  format: 'text',
};

function positiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'text' || value === 'json';
}

/**
 * Keeps the recognised, well-formed keys of a raw config object. Anything
 * else is reported through `warnings` and falls back to the default.
 */
export function normalizeConfig(raw: unknown, warnings: string[] = []): EreaderFwConfig {
  const config: EreaderFwConfig = { ...defaultConfig };
  if (typeof raw !== 'object' || raw === null) {
    if (raw !== undefined && raw !== null) warnings.push('Configuration must be an object');
    return config;
  }

  for (const [key, value] of Object.entries(raw)) {
    switch (key) {
      case 'maxDepth':
      case 'maxCount':
      case 'chunkSize':
        if (positiveInteger(value)) {
          config[key] = value;
        } else {
          warnings.push(`Ignoring ${key}: expected a positive integer`);
        }
        break;
      case 'format':
        if (isOutputFormat(value)) {
          config.format = value;
        } else {
          warnings.push(`Ignoring format: expected "text" or "json"`);
        }
        break;
      default:
        warnings.push(`Ignoring unknown option "${key}"`);
    }
  }
  return config;
}

export function loadConfig(searchFrom: string = process.cwd()): EreaderFwConfig {
  const explorer = cosmiconfigSync('ereaderfw');
  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      const warnings: string[] = [];
      const config = normalizeConfig(result.config, warnings);
      warnings.forEach((w) => console.warn(`Warning: ${result.filepath}: ${w}`));
      return config;
    }
  } catch (error) {
    console.warn('Warning: Failed to load configuration file:', error instanceof Error ? error.message : error);
  }
  return { ...defaultConfig };
}
