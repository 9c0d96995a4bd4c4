import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Get package version from package.json
 * Works from the TypeScript sources and from the compiled dist/ tree
 */
function getPackageVersion(): string {
  const candidates = [
    join(__dirname, '..', '..', 'package.json'),
    join(process.cwd(), 'package.json'),
  ];

  for (const packagePath of candidates) {
    try {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, 'utf-8'));
      if (
        typeof packageJson === 'object' &&
        packageJson !== null &&
        'version' in packageJson &&
        typeof packageJson.version === 'string'
      ) {
        return packageJson.version;
      }
    } catch {
      // Try the next location
    }
  }

  return '0.1.0';
}

// Export as constant so it's only read once
export const PACKAGE_VERSION = getPackageVersion();
