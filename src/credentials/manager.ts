/**
 * Credential Context
 *
 * Builds the authenticated session the collector consumes, using
 * @azure/identity. The core never prompts, refreshes or stores credentials:
 * it only receives the resulting context as a parameter.
 */

import type { TokenCredential } from "@azure/identity";
import type { Logger } from "../logging/index.js";
import { AuthenticationError } from "../errors.js";

// =============================================================================
// Types
// =============================================================================

export type AzureCredentialMethod =
  | "default"
  | "cli"
  | "service-principal"
  | "managed-identity"
  | "browser";

export type CredentialContextOptions = {
  /** Interactive sessions open a browser login; non-interactive ones never do. */
  interactive?: boolean;
  method?: AzureCredentialMethod;
  tenantId?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
};

/** Opaque authenticated session handed to the collector. */
export type CredentialContext = {
  readonly credential: TokenCredential;
  readonly method: AzureCredentialMethod;
  readonly tenantId?: string;
};

// =============================================================================
// Factory
// =============================================================================

/**
 * Resolve which credential method a run uses. An interactive run with the
 * default method logs in through the browser.
 */
export function resolveCredentialMethod(options: CredentialContextOptions): AzureCredentialMethod {
  const method = options.method ?? "default";
  if (options.interactive && method === "default") return "browser";
  return method;
}

/**
 * Create the credential context. A browser credential that cannot be
 * constructed falls back to the DefaultAzureCredential chain.
 */
export async function createCredentialContext(options: CredentialContextOptions = {}): Promise<CredentialContext> {
  const env = options.env ?? process.env;
  const tenantId = options.tenantId ?? env.AZURE_TENANT_ID;
  const method = resolveCredentialMethod(options);

  try {
    return { credential: await createCredential(method, tenantId, env), method, tenantId };
  } catch (error) {
    if (method !== "browser") throw error;
    options.logger?.warn("Interactive login unavailable, falling back to default credentials", {
      error: error instanceof Error ? error.message : String(error),
    });
    return { credential: await createCredential("default", tenantId, env), method: "default", tenantId };
  }
}

/**
 * Dynamic import of @azure/identity keeps startup cheap for commands that
 * never authenticate.
 */
async function createCredential(
  method: AzureCredentialMethod,
  tenantId: string | undefined,
  env: NodeJS.ProcessEnv,
): Promise<TokenCredential> {
  const identity = await import("@azure/identity");

  switch (method) {
    case "cli":
      return new identity.AzureCliCredential(tenantId ? { tenantId } : undefined);

    case "service-principal": {
      const clientId = env.AZURE_CLIENT_ID;
      const clientSecret = env.AZURE_CLIENT_SECRET;

      if (!tenantId || !clientId || !clientSecret) {
        throw new AuthenticationError(
          "Service principal auth requires AZURE_TENANT_ID, AZURE_CLIENT_ID, and AZURE_CLIENT_SECRET",
        );
      }

      return new identity.ClientSecretCredential(tenantId, clientId, clientSecret);
    }

    case "managed-identity": {
      const clientId = env.AZURE_CLIENT_ID;
      return clientId
        ? new identity.ManagedIdentityCredential({ clientId })
        : new identity.ManagedIdentityCredential();
    }

    case "browser":
      return new identity.InteractiveBrowserCredential(tenantId ? { tenantId } : {});

    case "default":
      return new identity.DefaultAzureCredential(tenantId ? { tenantId } : undefined);
  }
}
