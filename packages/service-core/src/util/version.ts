import * as fs from 'fs';

const readVersion = (): string => {
  const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'));
  if (typeof pkg == 'object' && pkg != null && 'version' in pkg && typeof pkg.version == 'string') {
    return pkg.version;
  }
  return '0.0.0';
};

/**
 * Version of the control plane, reported by every capture.
 */
export const CONTROL_PLANE_VERSION = readVersion();
