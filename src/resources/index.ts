export { AzureResourceSource, toPayload } from "./manager.js";
export type { RawResourceGroup, ResourceSource } from "./types.js";
