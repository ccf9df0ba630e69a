import type { BundleSource } from "@nlsbridge/application";
import type { BundleMapping } from "@nlsbridge/contracts";
import { createLogger, type Logger } from "@nlsbridge/shared";
import { readFile } from "node:fs/promises";
import {
  bundleFilePath,
  DEFAULT_BUNDLE_FORMATS,
  type BundleFileFormat,
} from "./bundle-paths.js";
import { parseBundleFile } from "./parse-bundle.js";

export interface FileSystemBundleSourceOptions {
  root: string;
  formats?: ReadonlyArray<BundleFileFormat>;
  logger?: Logger;
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

async function readIfExists(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
}

export function createFileSystemBundleSource(
  options: FileSystemBundleSourceOptions,
): BundleSource {
  const formats = options.formats ?? DEFAULT_BUNDLE_FORMATS;
  const logger = options.logger ?? createLogger("nls:fs-source");

  return {
    kind: "fs",
    async read(bundleName: string, suffix: string): Promise<BundleMapping | null> {
      for (const format of formats) {
        const path = bundleFilePath(options.root, bundleName, suffix, format);
        const content = await readIfExists(path);
        if (content === null) continue;

        logger.debug("reading bundle file", { path, format });
        return parseBundleFile(content, path, format);
      }

      return null;
    },
  };
}
