import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Loads and parses a JSON fixture from tests/fixtures
 */
export function loadFixture(name: string): unknown {
  const fullPath = join(process.cwd(), 'tests', 'fixtures', name);
  const parsed: unknown = JSON.parse(readFileSync(fullPath, 'utf-8'));
  return parsed;
}
