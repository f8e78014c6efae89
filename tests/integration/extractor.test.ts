import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Extractor } from '../../src/extractor/index.js';
import { copyFixtureProject, createTempProject } from '../helpers/fixtures.js';

describe('Extractor integration', () => {
  describe('inventory crate', () => {
    let project: ReturnType<typeof copyFixtureProject>;

    beforeEach(() => {
      project = copyFixtureProject('rust', 'inventory');
    });

    afterEach(() => {
      project.cleanup();
    });

    it('extracts every source file into one snapshot', async () => {
      const extractor = new Extractor({ rootDirectory: project.rootDir, include: [], exclude: [] });
      const result = await extractor.extractTree();

      expect(result.totalFiles).toBe(5);
      expect(result.skipped).toEqual([]);
      expect(result.duplicates).toEqual([]);
      expect(Array.from(result.snapshot.units.keys())).toEqual([
        'src/lib.rs',
        'src/model.rs',
        'src/service.rs',
        'src/store/memory.rs',
        'src/store/mod.rs',
      ]);
      expect(Array.from(result.snapshot.registry.keys())).toEqual([
        'crate::model::Describe',
        'crate::model::Item',
        'crate::model::Reason',
        'crate::model::Status',
        'crate::model::Tag',
        'crate::service::Service',
        'crate::store::Store',
        'crate::store::memory::MemoryStore',
      ]);
      expect(result.snapshot.registry.get('crate::store::Store')).toBe('src/store/mod.rs');
    });

    it('resolves call targets after the registry is complete', async () => {
      const extractor = new Extractor({ rootDirectory: project.rootDir, include: [], exclude: [] });
      const { snapshot } = await extractor.extractTree();

      const service = snapshot.units.get('src/service.rs');
      const receive = service?.impls[0]?.methods.find(m => m.name === 'receive');
      expect(receive?.calls).toEqual([
        { callee: '<expr>.with_tag', method: 'with_tag', target: null, line: 18 },
        { callee: 'Item::new', method: 'new', target: 'crate::model::Item', line: 18 },
        { callee: 'self.store.put', method: 'put', target: 'crate::store::memory::MemoryStore', line: 19 },
      ]);
    });

    it('extracts a directory other than the configured root', async () => {
      const extractor = new Extractor({ rootDirectory: '/nonexistent', include: [], exclude: [] });
      const result = await extractor.extractTree(project.getFilePath('src/store'));

      expect(Array.from(result.snapshot.units.keys())).toEqual(['memory.rs', 'mod.rs']);
      expect(result.snapshot.units.get('mod.rs')?.modulePath).toBe('crate');
      expect(result.snapshot.units.get('memory.rs')?.modulePath).toBe('crate::memory');
    });
  });

  describe('file selection', () => {
    let project: ReturnType<typeof createTempProject>;

    beforeEach(() => {
      project = createTempProject({
        'src/lib.rs': 'pub struct Root;\n',
        'target/debug/build.rs': 'pub struct Generated;\n',
        'vendor/extra.rs': 'pub struct Vendored;\n',
        'README.md': '# not rust\n',
      });
    });

    afterEach(() => {
      project.cleanup();
    });

    it('skips build output by default', async () => {
      const extractor = new Extractor({ rootDirectory: project.rootDir, include: [], exclude: [] });
      const result = await extractor.extractTree();

      expect(Array.from(result.snapshot.units.keys())).toEqual(['src/lib.rs', 'vendor/extra.rs']);
    });

    it('honours custom exclude patterns', async () => {
      const extractor = new Extractor({
        rootDirectory: project.rootDir,
        include: ['**/*.rs'],
        exclude: ['**/target/**', 'vendor/**'],
      });
      const result = await extractor.extractTree();

      expect(result.totalFiles).toBe(1);
      expect(Array.from(result.snapshot.registry.keys())).toEqual(['crate::Root']);
    });
  });

  describe('skipped files', () => {
    let project: ReturnType<typeof createTempProject>;

    afterEach(() => {
      project.cleanup();
    });

    it('reports unbalanced files and keeps the rest', async () => {
      project = createTempProject({
        'src/lib.rs': 'pub mod broken;\npub struct Fine;\n',
        'src/broken.rs': 'pub struct Open {\n    x: u8,\n',
      });
      const extractor = new Extractor({ rootDirectory: project.rootDir, include: [], exclude: [] });
      const result = await extractor.extractTree();

      expect(result.totalFiles).toBe(2);
      expect(result.skipped).toHaveLength(1);
      expect(result.skipped[0]?.filePath).toBe('src/broken.rs');
      expect(result.skipped[0]?.reason).toMatch(/^src\/broken\.rs:\d+: /);
      expect(Array.from(result.snapshot.units.keys())).toEqual(['src/lib.rs']);
    });

    it('skips files above the size limit', async () => {
      project = createTempProject({
        'src/lib.rs': 'pub struct Small;\n',
        'src/big.rs': `// ${'x'.repeat(200)}\npub struct Big;\n`,
      });
      const extractor = new Extractor({
        rootDirectory: project.rootDir,
        include: [],
        exclude: [],
        parserOptions: { maxFileSize: 100 },
      });
      const result = await extractor.extractTree();

      expect(result.skipped).toEqual([
        { filePath: 'src/big.rs', reason: 'file exceeds parser.maxFileSize' },
      ]);
      expect(Array.from(result.snapshot.registry.keys())).toEqual(['crate::Small']);
    });
  });

  describe('duplicate definitions', () => {
    let project: ReturnType<typeof createTempProject>;

    afterEach(() => {
      project.cleanup();
    });

    it('reports both locations and keeps the name out of the registry', async () => {
      project = createTempProject({
        'src/lib.rs': 'pub mod shapes;\n',
        'src/shapes.rs': 'pub struct X;\n',
        'src/shapes/mod.rs': 'pub struct X;\npub struct Y;\n',
      });
      const extractor = new Extractor({ rootDirectory: project.rootDir, include: [], exclude: [], concurrency: 1 });
      const result = await extractor.extractTree();

      expect(result.duplicates).toHaveLength(1);
      expect(result.duplicates[0]?.qualifiedName).toBe('crate::shapes::X');
      expect(result.duplicates[0]?.locations).toEqual([
        { filePath: 'src/shapes.rs', line: 1 },
        { filePath: 'src/shapes/mod.rs', line: 1 },
      ]);
      expect(result.snapshot.registry.has('crate::shapes::X')).toBe(false);
      expect(result.snapshot.registry.get('crate::shapes::Y')).toBe('src/shapes/mod.rs');
    });
  });
});
