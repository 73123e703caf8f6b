export { parseDiagnostics, parseDiagnosticLine, toCharacterColumn } from './DiagnosticParser.js';
export type { ParseOptions, RawDiagnostic } from './DiagnosticParser.js';
