export { PoCatalogIO, parsePo, serializePo, parseNPlurals } from './po.js';
export { detectSourceLanguage, detectFromText } from './language.js';
