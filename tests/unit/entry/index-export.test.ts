import { describe, it, expect } from 'vitest';

describe('src/index exports', () => {
  it('can be imported without side effects', async () => {
    const mod = await import('../../../src/index.js');

    expect(mod).toHaveProperty('Extractor');
    expect(mod).toHaveProperty('buildGraph');
    expect(mod).toHaveProperty('render');
    expect(mod).toHaveProperty('diffDirectories');
    expect(mod).toHaveProperty('ScanError');
  });
});
