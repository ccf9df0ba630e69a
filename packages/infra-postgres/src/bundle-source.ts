import type { BundleSource } from "@nlsbridge/application";
import type { BundleMapping } from "@nlsbridge/contracts";
import type { Pool } from "pg";

export type BundleEntryRow = {
  message_key: string;
  message_value: string | null;
};

// NULL values count as present and map to "".
export function mapBundleRows(rows: ReadonlyArray<BundleEntryRow>): BundleMapping | null {
  if (rows.length === 0) return null;

  return Object.freeze(
    Object.fromEntries(
      rows.map((row): [string, string] => [row.message_key, row.message_value ?? ""]),
    ),
  );
}

export function createPostgresBundleSource(pool: Pool): BundleSource {
  return {
    kind: "postgres",
    async read(bundleName: string, suffix: string): Promise<BundleMapping | null> {
      const result = await pool.query<BundleEntryRow>(
        `SELECT message_key, message_value
           FROM message_bundle_entries
          WHERE bundle_name = $1 AND locale_suffix = $2`,
        [bundleName, suffix],
      );

      return mapBundleRows(result.rows);
    },
  };
}
