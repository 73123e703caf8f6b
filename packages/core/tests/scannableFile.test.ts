import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { ScannableFile } from '../src/scanner/ScannableFile.js';
import { NodeDocumentModel } from '../src/host/NodeDocumentModel.js';
import { ScanValidationError } from '../src/errors.js';
import type { FileHandle } from '../src/types/DocumentModel.js';
import { createTempDir, createTempProject, removeTempDir, silentLogger } from './support.js';

let root: string;
let scratch: string;
let model: NodeDocumentModel;

beforeEach(() => {
  root = createTempProject({
    'saved.py': 'saved = True\n',
    'edited.py': 'edited = 1\n',
  });
  scratch = createTempDir();
  model = new NodeDocumentModel();
});

afterEach(() => {
  removeTempDir(root);
  removeTempDir(scratch);
});

function handleFor(name: string): FileHandle {
  const handle = model.findFile(join(root, name));
  if (!handle) throw new Error(`no handle for ${name}`);
  return handle;
}

test('unmodified files are read in place', async () => {
  const handle = handleFor('saved.py');
  const [file] = await ScannableFile.createAndValidate([handle], model, {
    tempDir: scratch,
    logger: silentLogger,
  });
  expect(file?.path).toBe(handle.path);
  expect(file?.isTemporary).toBe(false);
  expect(readdirSync(scratch)).toEqual([]);
});

test('unsaved edits are written to a temporary copy that cleanup removes', async () => {
  const handle = handleFor('edited.py');
  await model.setUnsavedText(handle.path, 'edited: str = 1\n');

  const [file] = await ScannableFile.createAndValidate([handle], model, {
    tempDir: scratch,
    logger: silentLogger,
  });
  if (!file) throw new Error('expected a snapshot');

  expect(file.isTemporary).toBe(true);
  expect(file.path).not.toBe(handle.path);
  expect(basename(file.path)).toBe('edited.py');
  expect(dirname(dirname(file.path))).toBe(scratch);
  expect(readFileSync(file.path, 'utf8')).toBe('edited: str = 1\n');

  await file.deleteIfRequired();
  expect(existsSync(file.path)).toBe(false);
  expect(readdirSync(scratch)).toEqual([]);
  expect(readFileSync(handle.path, 'utf8')).toBe('edited = 1\n');
});

test('files that were never saved get a temporary copy', async () => {
  const path = join(root, 'fresh.py');
  await model.setUnsavedText(path, 'fresh = 0\n');
  const handle = model.findFile(path);
  if (!handle) throw new Error('expected a handle');

  const files = await ScannableFile.createAndValidate([handle], model, {
    tempDir: scratch,
    logger: silentLogger,
  });
  expect(files[0]?.isTemporary).toBe(true);
  expect(readFileSync(files[0]?.path ?? '', 'utf8')).toBe('fresh = 0\n');
  await ScannableFile.releaseAll(files);
});

test('cleanup can run twice', async () => {
  const handle = handleFor('edited.py');
  await model.setUnsavedText(handle.path, 'edited = 2\n');
  const files = await ScannableFile.createAndValidate([handle], model, {
    tempDir: scratch,
    logger: silentLogger,
  });

  await ScannableFile.releaseAll(files);
  await expect(ScannableFile.releaseAll(files)).resolves.toBeUndefined();
  await expect(files[0]?.deleteIfRequired()).resolves.toBeUndefined();
});

test('an unreadable file fails validation and earlier snapshots are removed', async () => {
  class BrokenModel extends NodeDocumentModel {
    override async currentText(handle: FileHandle): Promise<string> {
      if (handle.path.endsWith('saved.py')) {
        throw new Error('permission denied');
      }
      return super.currentText(handle);
    }
  }
  const broken = new BrokenModel();
  const edited = broken.findFile(join(root, 'edited.py'));
  const saved = broken.findFile(join(root, 'saved.py'));
  if (!edited || !saved) throw new Error('expected handles');
  await broken.setUnsavedText(edited.path, 'edited = 3\n');

  const attempt = ScannableFile.createAndValidate([edited, saved], broken, {
    tempDir: scratch,
    logger: silentLogger,
  });
  await expect(attempt).rejects.toBeInstanceOf(ScanValidationError);
  await expect(attempt).rejects.toMatchObject({ filePath: saved.path });
  expect(readdirSync(scratch)).toEqual([]);
});

test('two handles for one path fail validation', async () => {
  const handle = handleFor('saved.py');
  const twin: FileHandle = { path: handle.path };
  await expect(
    ScannableFile.createAndValidate([handle, twin], model, {
      tempDir: scratch,
      logger: silentLogger,
    })
  ).rejects.toBeInstanceOf(ScanValidationError);
});

test('snapshots keep their path relative to the project root', async () => {
  const project = createTempProject({
    'pkg_a/__init__.py': '',
    'pkg_a/utils.py': 'a = 1\n',
    'pkg_b/__init__.py': '',
    'pkg_b/utils.py': 'b = 1\n',
  });
  try {
    const first = model.findFile(join(project, 'pkg_a', 'utils.py'));
    const second = model.findFile(join(project, 'pkg_b', 'utils.py'));
    if (!first || !second) throw new Error('expected handles');
    await model.setUnsavedText(first.path, 'a = 2\n');
    await model.setUnsavedText(second.path, 'b = 2\n');

    const files = await ScannableFile.createAndValidate([first, second], model, {
      tempDir: scratch,
      projectRoot: project,
      logger: silentLogger,
    });
    const [copyA, copyB] = files.map((file) => file.path);
    if (!copyA || !copyB) throw new Error('expected snapshots');

    expect(copyA.endsWith(join('pkg_a', 'utils.py'))).toBe(true);
    expect(copyB.endsWith(join('pkg_b', 'utils.py'))).toBe(true);
    expect(dirname(dirname(dirname(copyA)))).toBe(scratch);
    expect(readFileSync(copyA, 'utf8')).toBe('a = 2\n');
    expect(readFileSync(copyB, 'utf8')).toBe('b = 2\n');

    await ScannableFile.releaseAll(files);
    expect(readdirSync(scratch)).toEqual([]);
  } finally {
    removeTempDir(project);
  }
});
