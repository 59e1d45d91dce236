import fs from 'fs';
import path from 'path';

type BuildInfo = {
  name: string;
  version: string | null;
  gitSha: string;
  buildTime: string;
};

/**
 * Runtime build fingerprint, logged at startup.
 *
 * Prefers files baked into the container at build time (`.gitsha`, `.buildtime`, `package.json`),
 * then env vars a builder may inject. Never throws.
 */
export function getBuildInfo(name: string, cwd: string = process.cwd()): BuildInfo {
  const readTextFile = (filename: string): string | null => {
    try {
      const p = path.join(cwd, filename);
      if (!fs.existsSync(p)) return null;
      return fs.readFileSync(p, 'utf8').trim();
    } catch {
      return null;
    }
  };

  const gitSha = process.env.SERVICE_GIT_SHA || process.env.GITHUB_SHA || readTextFile('.gitsha') || 'unknown';
  const buildTime = process.env.SERVICE_BUILD_TIME || readTextFile('.buildtime') || new Date().toISOString();

  let version: string | null = null;
  const pkgText = readTextFile('package.json');
  if (pkgText) {
    try {
      const pkg: unknown = JSON.parse(pkgText);
      if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
        version = pkg.version;
      }
    } catch {
      version = null;
    }
  }

  return { name, version, gitSha, buildTime };
}
