export { renderTree, type RenderedFile } from "./render.js";
export { escapeMarkdown, propertyLines, renderMarkdown } from "./markdown.js";
export { renderJson, renderYaml, toStructuredDocument, type StructuredDocument } from "./structured.js";
export { DOCS_DIR, FORMAT_EXTENSIONS, outputPath, relativeLink } from "./links.js";
export {
  EXPORT_FORMAT_VERSION,
  dataExportPath,
  dataExportSchema,
  parseDataExport,
  renderDataExport,
  type DataExportDocument,
  type ParsedDataExport,
  type RawPayloadEntry,
} from "./export.js";
