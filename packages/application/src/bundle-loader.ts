import {
  bundleNameSchema,
  type BundleLayer,
  type BundleLoadReport,
  type Locale,
} from "@nlsbridge/contracts";
import {
  buildCandidateLocales,
  describeLocale,
  isRootLocale,
  localesEqual,
  MessageBundle,
  ROOT_LOCALE,
  toBundleSuffix,
} from "@nlsbridge/domain";
import { createLogger, type Logger } from "@nlsbridge/shared";
import type { BundleSource } from "./bundle-source.js";
import { MissingResourceError } from "./errors.js";
import { parseOrThrowBadRequest } from "./validation.js";

export interface LoadMessageBundleOptions {
  fallbackLocale?: Locale;
  logger?: Logger;
}

async function readLayers(
  source: BundleSource,
  bundleName: string,
  locales: ReadonlyArray<Locale>,
  logger: Logger,
): Promise<BundleLayer[]> {
  const layers: BundleLayer[] = [];

  for (const locale of locales) {
    const suffix = toBundleSuffix(locale);
    const mapping = await source.read(bundleName, suffix);
    if (!mapping) {
      logger.debug("bundle candidate missing", { bundleName, suffix });
      continue;
    }
    logger.debug("bundle candidate found", {
      bundleName,
      suffix,
      keys: Object.keys(mapping).length,
    });
    layers.push({ suffix, mapping });
  }

  return layers;
}

export function toBundleLoadReport(bundle: MessageBundle): BundleLoadReport {
  return {
    bundleName: bundle.bundleName,
    localeTag: describeLocale(bundle.locale),
    resolvedFrom: [...bundle.resolvedFrom],
    keyCount: bundle.size,
  };
}

function withoutRoot(locale: Locale): Locale[] {
  return buildCandidateLocales(locale).filter((candidate) => !isRootLocale(candidate));
}

// The root locale asks for the base bundle; only other locales fall back.
export async function loadMessageBundle(
  source: BundleSource,
  bundleName: string,
  locale: Locale,
  options: LoadMessageBundleOptions = {},
): Promise<MessageBundle> {
  const logger = options.logger ?? createLogger("nls:bundle-loader");
  const name = parseOrThrowBadRequest(
    bundleNameSchema,
    bundleName,
    "Invalid bundle name",
  );

  let layers = await readLayers(source, name, withoutRoot(locale), logger);

  const fallback = options.fallbackLocale;
  if (
    layers.length === 0 &&
    fallback &&
    !isRootLocale(locale) &&
    !localesEqual(fallback, locale)
  ) {
    logger.debug("trying fallback locale", {
      bundleName: name,
      fallbackLocale: describeLocale(fallback),
    });
    layers = await readLayers(source, name, withoutRoot(fallback), logger);
  }

  layers.push(...(await readLayers(source, name, [ROOT_LOCALE], logger)));

  if (layers.length === 0) {
    logger.warn("bundle not found", {
      bundleName: name,
      locale: describeLocale(locale),
      source: source.kind,
    });
    throw new MissingResourceError({
      bundleName: name,
      locale: describeLocale(locale),
    });
  }

  const bundle = MessageBundle.fromLayers(name, locale, layers);
  logger.debug("bundle loaded", { ...toBundleLoadReport(bundle) });

  return bundle;
}
