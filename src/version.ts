import * as fs from 'node:fs';
import { z } from 'zod';

const PackageSchema = z.object({ version: z.string() });

function readVersion(): string {
  // src/ and dist/ both sit one level below package.json
  const pkgUrl = new URL('../package.json', import.meta.url);
  return PackageSchema.parse(JSON.parse(fs.readFileSync(pkgUrl, 'utf-8'))).version;
}

export const VERSION = readVersion();
