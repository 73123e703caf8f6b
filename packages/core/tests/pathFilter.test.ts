import { createPathFilter, isWithin } from '../src/scanner/PathFilter.js';

const sourceOnly = createPathFilter({
  sourceExtensions: ['py', '.pyi'],
  sourceRoots: ['/proj/src'],
  projectRoots: ['/proj'],
  checkAllFiles: false,
});

test('files with a source extension inside a source root are eligible', () => {
  expect(sourceOnly({ path: '/proj/src/app/main.py' })).toBe(true);
  expect(sourceOnly({ path: '/proj/src/stubs/lib.pyi' })).toBe(true);
  expect(sourceOnly({ path: '/proj/src/UPPER.PY' })).toBe(true);
});

test('other extensions are not eligible', () => {
  expect(sourceOnly({ path: '/proj/src/notes.txt' })).toBe(false);
  expect(sourceOnly({ path: '/proj/src/Makefile' })).toBe(false);
});

test('files outside the source roots are not eligible', () => {
  expect(sourceOnly({ path: '/proj/tools/build.py' })).toBe(false);
  expect(sourceOnly({ path: '/proj/src2/other.py' })).toBe(false);
});

test('checkAllFiles widens containment to the project roots', () => {
  const allFiles = createPathFilter({
    sourceExtensions: ['py'],
    sourceRoots: ['/proj/src'],
    projectRoots: ['/proj'],
    checkAllFiles: true,
  });
  expect(allFiles({ path: '/proj/tools/build.py' })).toBe(true);
  expect(allFiles({ path: '/elsewhere/build.py' })).toBe(false);
});

test('isWithin compares whole path segments', () => {
  expect(isWithin('/proj/src', '/proj/src/a.py')).toBe(true);
  expect(isWithin('/proj/src', '/proj/src')).toBe(false);
  expect(isWithin('/proj/src', '/proj/src-old/a.py')).toBe(false);
  expect(isWithin('/proj/src', '/proj/src/..hidden.py')).toBe(true);
});
