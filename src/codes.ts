import * as fs from 'fs';
import * as path from 'path';
import { CodeTable, loadCodeTable } from './utils/csv';

export const UNKNOWN = 'Unknown';

/**
 * Name lookups used to label decoded codes. Lookups are total: a code with no
 * entry resolves to {@link UNKNOWN}.
 */
export interface CodeResolver {
  device(code: number): string;
  platform(code: number): string;
  certificate(id: number): string;
}

const CERTIFICATES: ReadonlyMap<number, string> = new Map([
  [0, 'Developer (pubdevkey01.pem)'],
  [1, 'Production 1K (pubprodkey01.pem)'],
  [2, 'Production 2K (pubprodkey02.pem)'],
]);

export class TableCodeResolver implements CodeResolver {
  constructor(
    private readonly devices: CodeTable,
    private readonly platforms: CodeTable,
  ) {}

  static fromDirectory(dataDir: string): TableCodeResolver {
    return new TableCodeResolver(
      loadCodeTable(path.join(dataDir, 'devices.csv')),
      loadCodeTable(path.join(dataDir, 'platforms.csv')),
    );
  }

  device(code: number): string {
    return this.devices.get(code) ?? UNKNOWN;
  }

  platform(code: number): string {
    return this.platforms.get(code) ?? UNKNOWN;
  }

  certificate(id: number): string {
    return CERTIFICATES.get(id) ?? UNKNOWN;
  }
}

// Source runs from src/, builds from dist/src/; look upwards for the bundled tables.
export function resolveDataDir(from: string = __dirname): string {
  const override = process.env.EREADER_FW_DATA_DIR;
  if (override) return path.resolve(override);

  let dir = from;
  for (;;) {
    const candidate = path.join(dir, 'data');
    if (fs.existsSync(path.join(candidate, 'devices.csv'))) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`Device tables not found above ${from}`);
    }
    dir = parent;
  }
}

let defaultResolver: TableCodeResolver | null = null;

export function getDefaultResolver(): CodeResolver {
  if (!defaultResolver) {
    defaultResolver = TableCodeResolver.fromDirectory(resolveDataDir());
  }
  return defaultResolver;
}
