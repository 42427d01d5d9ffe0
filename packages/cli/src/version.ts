import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const PackageJsonSchema = z.object({ version: z.string() });

/** Read from package.json, which sits one level above both src/ and dist/ */
export function readVersion(): string {
  const content = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8');
  return PackageJsonSchema.parse(JSON.parse(content)).version;
}
