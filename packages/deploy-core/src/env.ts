import fs from 'node:fs';
import path from 'node:path';

import { parse } from 'dotenv';

const isProduction = (env: NodeJS.ProcessEnv) => env.NODE_ENV?.toLowerCase() === 'production';

/**
 * Loads the first `.env` found among `candidates` (default: the working directory) into
 * `env` without overriding variables that are already set. Skipped in production.
 * Returns the file that was loaded, if any.
 */
export function loadDotenv(
  candidates: string[] = [path.resolve(process.cwd(), '.env')],
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  if (isProduction(env)) return undefined;

  const tried = new Set<string>();
  for (const candidate of candidates) {
    const normalized = path.normalize(candidate);
    if (tried.has(normalized)) continue;
    tried.add(normalized);

    if (!fs.existsSync(normalized)) continue;

    const parsed = parse(fs.readFileSync(normalized));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) env[key] = value;
    }
    return normalized;
  }
  return undefined;
}
