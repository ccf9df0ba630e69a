export interface Locale {
  language: string;
  country: string;
  variant: string;
}

export type BundleMapping = Readonly<Record<string, string>>;

export type BundleSourceKind = "fs" | "postgres";

export interface BundleLayer {
  suffix: string;
  mapping: BundleMapping;
}

export interface ResolverConfig {
  showMessageKeys: boolean;
  locale: Locale;
  fallbackLocale: Locale;
  bundleRoot: string;
  source: BundleSourceKind;
}

export interface BundleLoadReport {
  bundleName: string;
  localeTag: string;
  resolvedFrom: string[];
  keyCount: number;
}

export * from "./schemas/index.js";
