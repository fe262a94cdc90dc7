export {
  BUILTIN_HANDLERS_URL,
  HandlerRegistry,
  handlerFileSchema,
  loadHandlerFile,
  loadHandlerRegistry,
  parseHandlerFile,
  type HandlerField,
  type HandlerFile,
  type HandlerSpec,
} from "./handlers.js";
export { flattenGeneric, normalizeResource, type NormalizeContext } from "./normalizer.js";
export { readFirstPath, readPath, toPropertyValue } from "./values.js";
