import { z } from "zod";

// Checked as entries: a record schema would drop an own `__proto__` key.
export const jsonBundleEntriesSchema = z.array(z.tuple([z.string(), z.string()]));

export type JsonBundleEntries = z.infer<typeof jsonBundleEntriesSchema>;
