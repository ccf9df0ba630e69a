import type { BundleMapping } from "@nlsbridge/contracts";

// `null` means the candidate does not exist.
export interface BundleSource {
  readonly kind: string;
  read(bundleName: string, suffix: string): Promise<BundleMapping | null>;
}

export type InMemoryBundleCatalog = Record<
  string,
  Record<string, Record<string, string>>
>;

export function createInMemoryBundleSource(
  catalog: InMemoryBundleCatalog,
): BundleSource {
  const bundles = new Map<string, Map<string, BundleMapping>>();
  for (const [bundleName, bySuffix] of Object.entries(catalog)) {
    const candidates = new Map<string, BundleMapping>();
    for (const [suffix, mapping] of Object.entries(bySuffix)) {
      candidates.set(suffix, Object.freeze({ ...mapping }));
    }
    bundles.set(bundleName, candidates);
  }

  return {
    kind: "memory",
    async read(bundleName, suffix) {
      return bundles.get(bundleName)?.get(suffix) ?? null;
    },
  };
}
