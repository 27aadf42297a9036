export { chunkText, splitLongText } from "./chunk-text.js";
export {
  cleanText,
  decodeHtmlEntities,
  detectFormat,
  normalizeText,
  stripHtml,
  stripMarkdown,
} from "./normalize.js";
export { chunkId, processDocuments } from "./process-documents.js";
