export interface MessageResolver {
  resolve(key: string): string;
}

export const MISSING_KEY_SENTINEL = "!";

export function formatMissingKey(key: string): string {
  return `${MISSING_KEY_SENTINEL}${key}${MISSING_KEY_SENTINEL}`;
}

export function isMissingKeyMarker(message: string, key: string): boolean {
  return message === formatMissingKey(key);
}

export type MessageLookup = (key: string) => string | undefined;

export function resolveMessage(
  lookup: MessageLookup,
  key: string,
  showMessageKeys: boolean,
): string {
  if (showMessageKeys) return key;

  const message = lookup(key);
  return message === undefined ? formatMissingKey(key) : message;
}
