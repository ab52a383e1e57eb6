import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

// Sources live in core/ and the bundle in dist/; both sit one level below package.json
const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../package.json');

function readVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (packageJson && typeof packageJson === 'object' && 'version' in packageJson && typeof packageJson.version === 'string') {
      return packageJson.version;
    }
  } catch (error) {
    console.warn('Failed to read version from package.json:', error);
  }
  return '0.0.0';
}

export const version = readVersion();
