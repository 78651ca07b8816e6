import fs from 'fs';
import path from 'path';

const FALLBACK_VERSION = '0.0.0';

const readPackageVersion = (): string => {
  const packagePath = path.join(__dirname, '..', 'package.json');
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
      const { version } = parsed;
      if (typeof version === 'string') {
        return version;
      }
    }
  } catch {
    return FALLBACK_VERSION;
  }
  return FALLBACK_VERSION;
};

export const VERSION = readPackageVersion();
