import { z } from "zod";
import {
  bundleSourceKindSchema,
  localeTagSchema,
  nonEmptyStringSchema,
} from "./common.js";

export const resolverEnvSchema = z.object({
  showMessageKeys: z.boolean(),
  locale: z.union([z.literal(""), localeTagSchema]),
  fallbackLocale: localeTagSchema,
  bundleRoot: nonEmptyStringSchema,
  source: bundleSourceKindSchema,
});

export type ResolverEnv = z.infer<typeof resolverEnvSchema>;
