/**
 * CI gate: route files MUST NOT reach the database directly.
 *
 * All reads go through AnalysisQueryService. This test fails if any
 * *-routes.ts file imports the Drizzle accessor, the table definitions or a
 * concrete store.
 */

import { describe, it, expect } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const SERVER_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const FORBIDDEN_IMPORT_PATTERNS: Array<{ name: string; regex: RegExp }> = [
  { name: 'getAnalysisDb', regex: /import\s.*getAnalysisDb/ },
  { name: '@shared/analysis-schema', regex: /from\s+['"]@shared\/analysis-schema['"]/ },
  { name: 'PostgresAnalysisStore', regex: /import\s.*PostgresAnalysisStore/ },
  { name: 'MemAnalysisStore', regex: /import\s.*MemAnalysisStore/ },
];

function routeFiles(): string[] {
  return fs
    .readdirSync(SERVER_DIR)
    .filter((file) => file.endsWith('-routes.ts'))
    .sort();
}

describe('route files do not access storage directly', () => {
  it('finds the route files', () => {
    expect(routeFiles()).toEqual([
      'analysis-routes.ts',
      'health-routes.ts',
      'lookup-routes.ts',
      'metrics-routes.ts',
    ]);
  });

  it.each(routeFiles())('%s has no direct database imports', (file) => {
    const source = fs.readFileSync(path.join(SERVER_DIR, file), 'utf-8');
    const violations = FORBIDDEN_IMPORT_PATTERNS.filter(({ regex }) => regex.test(source)).map(
      ({ name }) => name
    );

    expect(violations).toEqual([]);
  });
});
