import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { UpstreamClientFactory } from "./types.js";

function toImportSpecifier(specifier: string): string {
  // File paths are resolved from the working directory; bare names go through normal package resolution.
  if (specifier.startsWith(".") || isAbsolute(specifier)) {
    return pathToFileURL(resolve(specifier)).href;
  }
  return specifier;
}

function hasFactory(mod: unknown): mod is { createUpstreamClient: UpstreamClientFactory } {
  return (
    typeof mod === "object" &&
    mod !== null &&
    "createUpstreamClient" in mod &&
    typeof mod.createUpstreamClient === "function"
  );
}

/**
 * Loads the module that provides the upstream client. It must export
 * `createUpstreamClient(tokens)`.
 */
export async function loadUpstreamFactory(specifier: string): Promise<UpstreamClientFactory> {
  const mod: unknown = await import(toImportSpecifier(specifier));
  if (!hasFactory(mod)) {
    throw new Error(`Upstream adapter "${specifier}" does not export createUpstreamClient()`);
  }
  return mod.createUpstreamClient;
}
