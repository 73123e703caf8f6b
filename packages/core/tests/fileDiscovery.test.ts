import { join } from 'node:path';
import { discoverFiles } from '../src/scanner/FileDiscovery.js';
import { NodeDocumentModel } from '../src/host/NodeDocumentModel.js';
import { ScanCancelledError } from '../src/errors.js';
import { createTempProject, removeTempDir } from './support.js';

let root: string;
let model: NodeDocumentModel;

beforeEach(() => {
  root = createTempProject({
    'pkg/a.py': 'a = 1\n',
    'pkg/sub/b.py': 'b = 2\n',
    'pkg/sub/deeper/c.txt': 'notes\n',
    'README.md': '# readme\n',
  });
  model = new NodeDocumentModel();
});

afterEach(() => {
  removeTempDir(root);
});

function sortedPaths(handles: { path: string }[]): string[] {
  return handles.map((handle) => handle.path).sort();
}

test('discoverFiles returns every non-directory descendant', async () => {
  const files = await discoverFiles(model, [root]);
  expect(sortedPaths(files)).toEqual(
    [
      join(root, 'README.md'),
      join(root, 'pkg/a.py'),
      join(root, 'pkg/sub/b.py'),
      join(root, 'pkg/sub/deeper/c.txt'),
    ].sort()
  );
});

test('discoverFiles returns a file root as is', async () => {
  const target = join(root, 'pkg/a.py');
  const files = await discoverFiles(model, [target]);
  expect(sortedPaths(files)).toEqual([target]);
});

test('discoverFiles skips roots that cannot be read', async () => {
  const files = await discoverFiles(model, [join(root, 'missing'), join(root, 'pkg')]);
  expect(files).toHaveLength(3);
});

test('discoverFiles does not repeat files under overlapping roots', async () => {
  const files = await discoverFiles(model, [root, join(root, 'pkg'), join(root, 'pkg/a.py')]);
  expect(files).toHaveLength(4);
});

test('discoverFiles includes unsaved files and reuses handles', async () => {
  const created = join(root, 'pkg/new.py');
  await model.setUnsavedText(created, 'n = 3\n');
  const files = await discoverFiles(model, [join(root, 'pkg')]);
  const handle = files.find((file) => file.path === created);
  expect(handle).toBeDefined();
  expect(model.findFile(created)).toBe(handle);
});

test('discoverFiles rejects when the scan is already cancelled', async () => {
  const controller = new AbortController();
  controller.abort();
  await expect(discoverFiles(model, [root], controller.signal)).rejects.toBeInstanceOf(
    ScanCancelledError
  );
});
