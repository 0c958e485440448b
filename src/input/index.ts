export { loadUnitsFromFiles, loadUnitFromFile, inputKindOf, IMAGE_EXTENSIONS, TEXT_EXTENSIONS } from './file-loader.js';
export type { InputKind } from './file-loader.js';
