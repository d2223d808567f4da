import { readFileSync } from 'fs';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { ProfileTableSchema, type ProfileTable } from '@cardparse/types';

export const PROFILE_DIR = fileURLToPath(new URL('../../profiles/', import.meta.url));

export function getProfileTablePath(id: string): string {
  return join(PROFILE_DIR, `${id}.json`);
}

/**
 * Validate an already-parsed profile table. Issues are reported with their JSON path
 * so a typo in a table points at the offending rule.
 */
export function parseProfileTable(raw: unknown, origin: string): ProfileTable {
  const result = ProfileTableSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '/'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid profile table ${origin}:\n${issues}`);
  }
  return result.data;
}

export function loadProfileTable(id: string): ProfileTable {
  const path = getProfileTablePath(id);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const table = parseProfileTable(raw, path);
  if (table.id !== id) {
    throw new Error(`Profile table ${path} declares id "${table.id}", expected "${id}"`);
  }
  return table;
}
