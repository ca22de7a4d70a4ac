import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const FALLBACK_VERSION = '0.0.0';

let cachedVersion: string | null = null;

function readPackageVersion(packageJsonPath: string): string | null {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return null;
  } catch (_error) {
    // Missing or unreadable; the caller tries the next location
    return null;
  }
}

export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }

  const __dirname = dirname(fileURLToPath(import.meta.url));

  const possiblePaths = [
    join(__dirname, '../../package.json'), // src/utils/version.ts and dist/utils/version.js
    join(process.cwd(), 'package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    const version = readPackageVersion(packageJsonPath);
    if (version) {
      cachedVersion = version;
      return version;
    }
  }

  cachedVersion = FALLBACK_VERSION;
  return cachedVersion;
}
