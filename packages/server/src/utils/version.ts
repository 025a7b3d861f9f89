/**
 * @file version.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

export const PACKAGE_NAME = '@chorus/server';

/**
 * Reads the server version from package.json.
 */
export function getServerVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);
  // - "../package.json" works when running from dist/ (compiled)
  // - "../../package.json" works when running from src/utils/ (development)
  const possiblePaths = [
    join(__dirname, '../package.json'),
    join(__dirname, '../../package.json'),
  ];

  for (const packageJsonPath of possiblePaths) {
    let content: string;
    try {
      content = readFileSync(packageJsonPath, 'utf8');
    } catch {
      continue;
    }

    const packageJson = JSON.parse(content) as { version?: unknown; name?: unknown };
    // Verify it's the correct package.json by checking the name
    if (
      packageJson.name === PACKAGE_NAME &&
      typeof packageJson.version === 'string' &&
      packageJson.version.length > 0
    ) {
      return packageJson.version;
    }
  }

  return 'unknown';
}
