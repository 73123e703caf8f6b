export { NodeDocumentModel } from './NodeDocumentModel.js';
export type { NodeDocumentModelOptions } from './NodeDocumentModel.js';
