import { DateTime } from "luxon";

export function utcNowIso(): string {
  const iso = DateTime.utc().toISO();
  if (!iso) {
    throw new Error("Failed to generate current UTC timestamp");
  }
  return iso;
}

export function toUtcIso(value: Date): string {
  const iso = DateTime.fromJSDate(value, { zone: "utc" }).toISO();
  if (!iso) {
    throw new Error("Failed to convert date to UTC ISO timestamp");
  }
  return iso;
}
