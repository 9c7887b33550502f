import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import { isDenied, listFiles, pruneDenied } from './denylist';

describe('isDenied', () => {
  it.each([
    'README.md',
    'readme',
    'LICENSE',
    'CHANGELOG.txt',
    'index.js.map',
    'app.tsbuildinfo',
    'handler.spec.ts',
    'util.test.mjs',
    'guide.rst',
    'libcrypto.so.1.1',
    'gyp.pyc',
    'mod.pyo',
  ])('removes the file %s', (name) => {
    expect(isDenied(name, false)).toBe(true);
  });

  it.each(['index.js', 'package.json', 'libcrypto.so', 'testing.js', 'spec.js', 'mdast.js', 'gyp.py'])(
    'keeps the file %s',
    (name) => {
      expect(isDenied(name, false)).toBe(false);
    },
  );

  it.each(['test', '__tests__', 'docs', 'examples', '.github', 'coverage', '__pycache__'])(
    'removes the directory %s',
    (name) => {
      expect(isDenied(name, true)).toBe(true);
    },
  );

  it('keeps ordinary directories', () => {
    expect(isDenied('lib', true)).toBe(false);
    expect(isDenied('testing', true)).toBe(false);
  });
});

describe('pruneDenied', () => {
  let root: string;

  const write = (relative: string, content = 'x') => {
    const file = join(root, relative);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, content);
  };

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'denylist-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('removes denied paths anywhere in the tree and reports them', () => {
    write('index.js');
    write('node_modules/pkg/package.json', '{}');
    write('node_modules/pkg/lib/main.js');
    write('node_modules/pkg/lib/main.js.map');
    write('node_modules/pkg/README.md');
    write('node_modules/pkg/test/main.test.js');
    write('node_modules/pkg/docs/api.html');
    write('node_modules/node-gyp/gyp/pylib/gyp/__init__.py');
    write('node_modules/node-gyp/gyp/pylib/gyp/common.pyc');
    write('node_modules/node-gyp/gyp/pylib/gyp/__pycache__/input.cpython-311.pyc');

    const removed = pruneDenied(root);

    expect(removed).toEqual([
      'node_modules/node-gyp/gyp/pylib/gyp/__pycache__',
      'node_modules/node-gyp/gyp/pylib/gyp/common.pyc',
      'node_modules/pkg/README.md',
      'node_modules/pkg/docs',
      'node_modules/pkg/lib/main.js.map',
      'node_modules/pkg/test',
    ]);
    expect(listFiles(root)).toEqual([
      'index.js',
      'node_modules/node-gyp/gyp/pylib/gyp/__init__.py',
      'node_modules/pkg/lib/main.js',
      'node_modules/pkg/package.json',
    ]);
  });
});
