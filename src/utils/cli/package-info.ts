import fs from 'fs-extra';
import path from 'path';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
}

const asString = (value: unknown, fallback: string): string =>
  typeof value === 'string' ? value : fallback;

/**
 * Read name, version and description from the package manifest at the project root
 * (`src/utils/cli` in development, `dist/utils/cli` when built).
 */
export const readPackageInfo = (
  manifestPath: string = path.join(__dirname, '../../../package.json')
): PackageInfo => {
  const data: unknown = fs.readJsonSync(manifestPath, { throws: false });
  if (typeof data !== 'object' || data === null) {
    return { name: 'git-ignore', version: '0.0.0', description: '' };
  }

  return {
    name: asString(Reflect.get(data, 'name'), 'git-ignore'),
    version: asString(Reflect.get(data, 'version'), '0.0.0'),
    description: asString(Reflect.get(data, 'description'), ''),
  };
};
