import { InvalidArgumentError } from "commander";

/** Commander argument parser for positive integer flags. */
export function parseIntegerOption(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

export function stringOption(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function stringListOption(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === "string");
}

export function numberOption(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/** Options every command accepts. */
export function commonOptions(opts: Record<string, unknown>) {
  return {
    tenant: stringOption(opts.tenant),
    nonInteractive: Boolean(opts.nonInteractive),
    config: stringOption(opts.config),
    logLevel: stringOption(opts.logLevel),
  };
}
