import type { Locale } from "@nlsbridge/contracts";

export const ROOT_LOCALE: Readonly<Locale> = Object.freeze({
  language: "",
  country: "",
  variant: "",
});

const ROOT_ALIASES = new Set(["", "c", "posix", "root", "und"]);

export function stripLocaleQualifiers(raw: string): string {
  const base = raw.trim().split(/[.@]/)[0] ?? "";
  return ROOT_ALIASES.has(base.toLowerCase()) ? "" : base;
}

export function parseLocale(raw: string): Locale {
  const base = stripLocaleQualifiers(raw);
  if (base === "") {
    return { ...ROOT_LOCALE };
  }

  const [language = "", country = "", ...variantParts] = base.split(/[-_]/);
  return {
    language: language.toLowerCase(),
    country: country.toUpperCase(),
    variant: variantParts.join("_"),
  };
}

export function isRootLocale(locale: Locale): boolean {
  return locale.language === "" && locale.country === "" && locale.variant === "";
}

export function toLocaleTag(locale: Locale): string {
  return [locale.language, locale.country, locale.variant]
    .filter((part) => part.length > 0)
    .join("-");
}

export function describeLocale(locale: Locale): string {
  return isRootLocale(locale) ? "root" : toLocaleTag(locale);
}

export function toBundleSuffix(locale: Locale): string {
  if (locale.variant) {
    return `_${locale.language}_${locale.country}_${locale.variant}`;
  }
  if (locale.country) {
    return `_${locale.language}_${locale.country}`;
  }
  if (locale.language) {
    return `_${locale.language}`;
  }
  return "";
}

export function localesEqual(left: Locale, right: Locale): boolean {
  return toBundleSuffix(left) === toBundleSuffix(right);
}

export function buildCandidateLocales(locale: Locale): Locale[] {
  const chain: Locale[] = [];
  if (locale.variant) chain.push({ ...locale });
  if (locale.country) {
    chain.push({ language: locale.language, country: locale.country, variant: "" });
  }
  if (locale.language) {
    chain.push({ language: locale.language, country: "", variant: "" });
  }
  chain.push({ ...ROOT_LOCALE });

  const seen = new Set<string>();
  return chain.filter((candidate) => {
    const suffix = toBundleSuffix(candidate);
    if (seen.has(suffix)) return false;
    seen.add(suffix);
    return true;
  });
}
