export { generateImportId, isImportId } from './import-id.js';
