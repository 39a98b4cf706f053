import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// ES Module compatibility for __dirname
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DATA_DIR = path.join(__dirname, '..', 'data');

/**
 * Read and validate a JSON file from server/data. Throws on a missing file or
 * on content that does not match the schema.
 */
export function readDataFile<T>(fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const filePath = path.join(DATA_DIR, fileName);
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid data in ${fileName}: ${parsed.error.message}`);
  }
  return parsed.data;
}
