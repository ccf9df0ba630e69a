import type { BundleLoadReport, Locale } from "@nlsbridge/contracts";
import {
  resolveMessage,
  ROOT_LOCALE,
  type MessageBundle,
  type MessageResolver,
} from "@nlsbridge/domain";
import type { Logger } from "@nlsbridge/shared";
import { loadMessageBundle, toBundleLoadReport } from "./bundle-loader.js";
import type { BundleSource } from "./bundle-source.js";

export interface ResourceBundleMessageResolverDeps {
  source: BundleSource;
  locale?: Locale;
  fallbackLocale?: Locale;
  showMessageKeys?: boolean;
  logger?: Logger;
}

export class ResourceBundleMessageResolver implements MessageResolver {
  private constructor(
    private readonly bundle: MessageBundle,
    readonly showMessageKeys: boolean,
  ) {}

  static async create(
    bundleName: string,
    deps: ResourceBundleMessageResolverDeps,
  ): Promise<ResourceBundleMessageResolver> {
    const bundle = await loadMessageBundle(
      deps.source,
      bundleName,
      deps.locale ?? ROOT_LOCALE,
      {
        ...(deps.fallbackLocale !== undefined
          ? { fallbackLocale: deps.fallbackLocale }
          : {}),
        ...(deps.logger !== undefined ? { logger: deps.logger } : {}),
      },
    );

    return new ResourceBundleMessageResolver(
      bundle,
      deps.showMessageKeys ?? false,
    );
  }

  get bundleName(): string {
    return this.bundle.bundleName;
  }

  get locale(): Readonly<Locale> {
    return this.bundle.locale;
  }

  describe(): BundleLoadReport {
    return toBundleLoadReport(this.bundle);
  }

  resolve(key: string): string {
    return resolveMessage(
      (candidate) => this.bundle.get(candidate),
      key,
      this.showMessageKeys,
    );
  }
}
