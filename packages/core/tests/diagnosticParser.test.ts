import { join } from 'node:path';
import {
  parseDiagnosticLine,
  parseDiagnostics,
  toCharacterColumn,
} from '../src/parser/DiagnosticParser.js';
import { NodeDocumentModel } from '../src/host/NodeDocumentModel.js';
import type { FileHandle } from '../src/types/DocumentModel.js';
import { createTempProject, removeTempDir } from './support.js';

const model = new NodeDocumentModel();
const fileA: FileHandle = { path: '/tmp/a.py' };

function optionsFor(...handles: FileHandle[]) {
  return {
    tabWidth: 4,
    baseDir: '/proj',
    filesByPath: new Map(handles.map((handle) => [handle.path, handle] as const)),
    model,
  };
}

test('a line with a column parses into one diagnostic', async () => {
  const result = await parseDiagnostics(
    ['/tmp/a.py:10:3: error: Incompatible types'],
    optionsFor(fileA)
  );
  expect(result.get(fileA)).toEqual([
    {
      file: fileA,
      severity: 'error',
      message: 'Incompatible types',
      line: 10,
      column: 3,
      code: null,
    },
  ]);
});

test('a missing column defaults to 1', async () => {
  const result = await parseDiagnostics(['/tmp/a.py:10: error: msg'], optionsFor(fileA));
  expect(result.get(fileA)?.[0]?.column).toBe(1);
  expect(result.get(fileA)?.[0]?.line).toBe(10);
});

test('diagnostics for unknown paths are dropped', async () => {
  const result = await parseDiagnostics(
    ['/usr/lib/stubs/os.pyi:1: error: stub problem'],
    optionsFor(fileA)
  );
  expect(result.get(fileA)).toEqual([]);
  expect(result.size).toBe(1);
});

test('banner and blank lines are ignored', async () => {
  const result = await parseDiagnostics(
    [
      '',
      'Success: no issues found in 1 source file',
      'Found 1 error in 1 file (checked 1 source file)',
      '/tmp/a.py:2: warning: unused "type: ignore" comment',
    ],
    optionsFor(fileA)
  );
  expect(result.get(fileA)?.map((d) => d.severity)).toEqual(['warning']);
});

test('relative paths resolve against the base directory', async () => {
  const module: FileHandle = { path: '/proj/pkg/m.py' };
  const result = await parseDiagnostics(['pkg/m.py:2: error: x'], optionsFor(module));
  expect(result.get(module)?.[0]?.message).toBe('x');
});

test('severity is case insensitive and falls back to error', () => {
  expect(parseDiagnosticLine('/tmp/a.py:1: NOTE: see docs')?.severity).toBe('note');
  expect(parseDiagnosticLine('/tmp/a.py:1: fatal: boom')?.severity).toBe('error');
});

test('a trailing error code is split from the message', () => {
  expect(
    parseDiagnosticLine(
      '/tmp/a.py:4:5: error: Argument 1 to "f" has incompatible type "str"; expected "int"  [arg-type]'
    )
  ).toEqual({
    path: '/tmp/a.py',
    line: 4,
    column: 5,
    severity: 'error',
    message: 'Argument 1 to "f" has incompatible type "str"; expected "int"',
    code: 'arg-type',
  });
});

test('diagnostics keep the order of the stream', async () => {
  const result = await parseDiagnostics(
    [
      '/tmp/a.py:5: error: first',
      '/tmp/a.py:2: error: second',
      '/tmp/a.py:9: note: third',
    ],
    optionsFor(fileA)
  );
  expect(result.get(fileA)?.map((d) => d.line)).toEqual([5, 2, 9]);
});

test('columns on tab-indented lines become character offsets', async () => {
  const root = createTempProject({ 'tabbed.py': 'def f():\n\treturn x\n' });
  try {
    const handle: FileHandle = { path: join(root, 'tabbed.py') };
    const result = await parseDiagnostics(
      [`${handle.path}:2:12: error: Name "x" is not defined  [name-defined]`],
      optionsFor(handle)
    );
    expect(result.get(handle)?.[0]).toMatchObject({
      line: 2,
      column: 9,
      code: 'name-defined',
    });
  } finally {
    removeTempDir(root);
  }
});

test('toCharacterColumn leaves space-indented lines alone', () => {
  expect(toCharacterColumn('    return x', 12, 4)).toBe(12);
  expect(toCharacterColumn(undefined, 7, 4)).toBe(7);
  expect(toCharacterColumn('\t\tpass', 9, 4)).toBe(3);
});
