import {
  resolveResolverConfig,
  ResourceBundleMessageResolver,
  type BundleSource,
} from "@nlsbridge/application";
import type { Locale, ResolverConfig } from "@nlsbridge/contracts";
import { createFileSystemBundleSource } from "@nlsbridge/infra-fs";
import {
  createPostgresBundleSource,
  createPostgresPool,
} from "@nlsbridge/infra-postgres";
import {
  createLogger,
  resolveLogLevel,
  stderrSink,
  type Logger,
} from "@nlsbridge/shared";
import type { Pool } from "pg";

export interface CliCompositionRootDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  bundleSource?: BundleSource;
  postgresPool?: Pool;
}

export interface ResolverOverrides {
  locale?: Locale;
  showMessageKeys?: boolean;
}

export interface CliCompositionRoot {
  readonly config: ResolverConfig;
  readonly logger: Logger;
  createResolver(
    bundleName: string,
    overrides?: ResolverOverrides,
  ): Promise<ResourceBundleMessageResolver>;
  close(): Promise<void>;
}

export function createCliCompositionRoot(
  deps: CliCompositionRootDeps = {},
): CliCompositionRoot {
  const env = deps.env ?? process.env;
  const config = resolveResolverConfig(env);
  // stdout carries the resolved messages only
  const logger =
    deps.logger ??
    createLogger("nls-resolve", {
      level: resolveLogLevel(env.NLS_LOG_LEVEL),
      json: env.NLS_LOG_JSON === "1",
      sink: stderrSink,
    });

  let ownedPool: Pool | null = null;

  const resolveSource = (): BundleSource => {
    if (deps.bundleSource) return deps.bundleSource;

    if (config.source === "postgres") {
      const pool = deps.postgresPool ?? (ownedPool ??= createPostgresPool());
      return createPostgresBundleSource(pool);
    }

    return createFileSystemBundleSource({
      root: config.bundleRoot,
      logger: logger.child("fs"),
    });
  };

  return {
    config,
    logger,

    async createResolver(bundleName, overrides = {}) {
      return ResourceBundleMessageResolver.create(bundleName, {
        source: resolveSource(),
        locale: overrides.locale ?? config.locale,
        fallbackLocale: config.fallbackLocale,
        showMessageKeys: overrides.showMessageKeys ?? config.showMessageKeys,
        logger: logger.child("loader"),
      });
    },

    async close() {
      if (ownedPool) {
        await ownedPool.end();
        ownedPool = null;
      }
    },
  };
}
