import { BundleFormatError } from "@nlsbridge/application";
import { jsonBundleEntriesSchema, type BundleMapping } from "@nlsbridge/contracts";
import { parseLines } from "dot-properties";
import type { BundleFileFormat } from "./bundle-paths.js";

// Mappings are built with Object.fromEntries so that a `__proto__` key
// stays an own property.

export function parsePropertiesBundle(content: string, path: string): BundleMapping {
  const entries: Array<[string, string]> = [];

  for (const line of parseLines(content)) {
    if (!Array.isArray(line)) continue;
    const [key, value] = line;
    if (typeof key !== "string" || typeof value !== "string") {
      throw new BundleFormatError("Properties bundle has a malformed line", {
        path,
        line: line.join(" "),
      });
    }
    entries.push([key, value]);
  }

  return Object.freeze(Object.fromEntries(entries));
}

export function parseJsonBundle(content: string, path: string): BundleMapping {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new BundleFormatError("Bundle file is not valid JSON", { path }, error);
  }

  if (typeof document !== "object" || document === null || Array.isArray(document)) {
    throw new BundleFormatError(
      "JSON bundle must be a flat object of string values",
      { path },
    );
  }

  const entries = Object.entries(document);
  const parsed = jsonBundleEntriesSchema.safeParse(entries);
  if (!parsed.success) {
    throw new BundleFormatError(
      "JSON bundle must be a flat object of string values",
      {
        path,
        issues: parsed.error.issues.map((issue) => {
          const index = issue.path[0];
          return {
            key: typeof index === "number" ? entries[index]?.[0] : undefined,
            message: issue.message,
          };
        }),
      },
    );
  }

  return Object.freeze(Object.fromEntries(parsed.data));
}

export function parseBundleFile(
  content: string,
  path: string,
  format: BundleFileFormat,
): BundleMapping {
  return format === "properties"
    ? parsePropertiesBundle(content, path)
    : parseJsonBundle(content, path);
}
