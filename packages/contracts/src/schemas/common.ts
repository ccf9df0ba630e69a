import { z } from "zod";

export const nonEmptyStringSchema = z.string().trim().min(1);

const BUNDLE_SEGMENT = "[A-Za-z0-9_-]+";
const BUNDLE_NAME_REGEX = new RegExp(
  `^${BUNDLE_SEGMENT}(?:\\.${BUNDLE_SEGMENT})*$`,
);

export const bundleNameSchema = z
  .string()
  .regex(
    BUNDLE_NAME_REGEX,
    "Bundle name must be dot-separated segments of letters, digits, '_' or '-'",
  );

export const localeTagSchema = z
  .string()
  .trim()
  .regex(
    /^[A-Za-z]{2,8}(?:[-_][A-Za-z0-9]{1,8})*$/,
    "Locale must look like 'en', 'de-DE' or 'pt_BR'",
  );

export const bundleSourceKindSchema = z.enum(["fs", "postgres"]);
