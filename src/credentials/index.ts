export { createCredentialContext, resolveCredentialMethod } from "./manager.js";

export type { AzureCredentialMethod, CredentialContext, CredentialContextOptions } from "./manager.js";
