import * as fs from 'fs';
import * as path from 'path';

/**
 * Domain Purity Test
 *
 * Ensures src/domain/ contains only pure computation and types.
 * Files in this directory must NOT import impure dependencies like
 * the logger, configuration, services, engines or Node I/O modules.
 */

const DOMAIN_DIR = path.resolve(__dirname, '..');
const FORBIDDEN_PATTERNS = [
  /from\s+['"].*logger/,
  /from\s+['"].*config/,
  /from\s+['"].*\.service/,
  /from\s+['"].*engines/,
  /from\s+['"]winston['"]/,
  /from\s+['"]dotenv['"]/,
  /from\s+['"](node:)?(fs|fs\/promises|child_process|net|http)['"]/,
  /import\s+['"].*logger/,
  /import\s+['"].*config/,
  /import\s+['"]dotenv/,
];

function getAllTsFiles(dir: string): string[] {
  const files: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === '__tests__' || entry.name === 'node_modules') continue;
      files.push(...getAllTsFiles(fullPath));
    } else if (entry.name.endsWith('.ts') && !entry.name.endsWith('.test.ts') && !entry.name.endsWith('.spec.ts')) {
      files.push(fullPath);
    }
  }

  return files;
}

describe('Domain purity', () => {
  it('finds the domain sources', () => {
    const relativePaths = getAllTsFiles(DOMAIN_DIR).map((filePath) => path.relative(DOMAIN_DIR, filePath));

    expect(relativePaths).toEqual(
      expect.arrayContaining([
        path.join('auction', 'bidder.ts'),
        path.join('auction', 'precision.ts'),
        path.join('auction', 'pricing.ts'),
        path.join('auction', 'auction-result.ts'),
      ])
    );
  });

  it('should not contain impure imports in src/domain/', () => {
    const violations: string[] = [];

    for (const filePath of getAllTsFiles(DOMAIN_DIR)) {
      const content = fs.readFileSync(filePath, 'utf-8');
      const lines = content.split('\n');
      const relativePath = path.relative(DOMAIN_DIR, filePath);

      for (let i = 0; i < lines.length; i++) {
        const line = lines[i];
        for (const pattern of FORBIDDEN_PATTERNS) {
          if (pattern.test(line)) {
            violations.push(`${relativePath}:${i + 1}: ${line.trim()}`);
          }
        }
      }
    }

    expect(violations).toEqual([]);
  });
});
