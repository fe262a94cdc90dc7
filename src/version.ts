import { readFileSync } from "node:fs";

function readVersionFromPackageJson(): string | null {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf8"));
    if (typeof pkg !== "object" || pkg === null) return null;
    const version: unknown = Reflect.get(pkg, "version");
    return typeof version === "string" ? version : null;
  } catch {
    return null;
  }
}

// Single source of truth for the current version: package.json, unless the
// environment pins one.
export const VERSION = process.env.AZDOCS_VERSION || readVersionFromPackageJson() || "0.0.0";
