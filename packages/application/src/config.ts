import { resolverEnvSchema, type ResolverConfig } from "@nlsbridge/contracts";
import { parseLocale, stripLocaleQualifiers } from "@nlsbridge/domain";
import {
  createEnvPropertySource,
  firstProperty,
  parseBooleanFlag,
} from "@nlsbridge/shared";
import { ConfigurationError } from "./errors.js";
import { formatZodIssues } from "./validation.js";

export const SHOW_MESSAGE_KEYS_PROPERTIES = [
  "showMessageKeys",
  "SHOW_MESSAGE_KEYS",
] as const;

const DEFAULT_FALLBACK_LOCALE = "en";
const DEFAULT_BUNDLE_ROOT = "./bundles";

/**
 * Reads resolver settings once from the environment:
 *
 *   showMessageKeys / SHOW_MESSAGE_KEYS  echo keys instead of resolving (default false)
 *   NLS_LOCALE, else LANG                 active locale (default root)
 *   NLS_FALLBACK_LOCALE                   default "en"
 *   NLS_BUNDLE_ROOT                       default "./bundles"
 *   NLS_BUNDLE_SOURCE                     fs | postgres (default fs)
 */
export function resolveResolverConfig(
  env: NodeJS.ProcessEnv = process.env,
): ResolverConfig {
  const properties = createEnvPropertySource(env);

  const parsed = resolverEnvSchema.safeParse({
    showMessageKeys:
      parseBooleanFlag(firstProperty(properties, SHOW_MESSAGE_KEYS_PROPERTIES)) ??
      false,
    locale: stripLocaleQualifiers(
      firstProperty(properties, ["NLS_LOCALE", "LANG"]) ?? "",
    ),
    fallbackLocale:
      properties.get("NLS_FALLBACK_LOCALE") ?? DEFAULT_FALLBACK_LOCALE,
    bundleRoot: properties.get("NLS_BUNDLE_ROOT") ?? DEFAULT_BUNDLE_ROOT,
    source: properties.get("NLS_BUNDLE_SOURCE") ?? "fs",
  });

  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid resolver configuration - ${formatZodIssues(parsed.error.issues)}`,
    );
  }

  return {
    showMessageKeys: parsed.data.showMessageKeys,
    locale: parseLocale(parsed.data.locale),
    fallbackLocale: parseLocale(parsed.data.fallbackLocale),
    bundleRoot: parsed.data.bundleRoot,
    source: parsed.data.source,
  };
}
