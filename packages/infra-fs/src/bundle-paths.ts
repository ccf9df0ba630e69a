import { join } from "node:path";

export type BundleFileFormat = "properties" | "json";

export const DEFAULT_BUNDLE_FORMATS: ReadonlyArray<BundleFileFormat> = [
  "properties",
  "json",
];

/**
 * `com.example.messages` + `_de` under `root` becomes
 * `root/com/example/messages_de.properties`.
 */
export function bundleFilePath(
  root: string,
  bundleName: string,
  suffix: string,
  format: BundleFileFormat,
): string {
  const segments = bundleName.split(".");
  const baseName = segments.pop() ?? bundleName;
  return join(root, ...segments, `${baseName}${suffix}.${format}`);
}
