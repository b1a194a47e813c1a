import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

function tryLoad(filePath: string) {
  if (!filePath) return;
  if (!fs.existsSync(filePath)) return;
  dotenv.config({ path: filePath, override: false });
}

export function loadDotenv() {
  // When running from dist/ (e.g. `node dist/index.js`), import.meta.url points
  // to dist/config/dotenvLoader.js, so `..` resolves to dist/ rather than the package root.
  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const parentDir = path.resolve(thisDir, '..');
  const packageDir = path.basename(parentDir) === 'dist' ? path.resolve(parentDir, '..') : parentDir;

  // Respect explicit override if provided.
  const explicit = process.env.DOTENV_CONFIG_PATH;
  if (explicit) {
    tryLoad(explicit);
    return;
  }

  // The working directory wins over the install location.
  tryLoad(path.join(process.cwd(), '.env'));
  tryLoad(path.join(process.cwd(), '.env.local'));

  tryLoad(path.join(packageDir, '.env'));
  tryLoad(path.join(packageDir, '.env.local'));
}
