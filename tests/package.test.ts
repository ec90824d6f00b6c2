import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';

const manifest: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf-8'));

describe('package.json', () => {
  it('should expose the CLI only as a bin, never as an importable entry', () => {
    expect(manifest).toMatchObject({ bin: { statusquota: 'dist/src/index.js' } });
    expect(manifest).not.toHaveProperty('main');
    expect(manifest).not.toHaveProperty('types');
  });
});
