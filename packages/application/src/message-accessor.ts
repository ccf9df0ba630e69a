import { isMissingKeyMarker, type MessageResolver } from "@nlsbridge/domain";

export type MessageArgument = string | number | boolean | bigint | Date;

export interface MessageAccessor {
  getString(key: string): string;
  format(key: string, ...args: MessageArgument[]): string;
}

const PLACEHOLDER_REGEX = /\{(\d+)\}/g;

export function substitutePlaceholders(
  template: string,
  args: ReadonlyArray<MessageArgument>,
): string {
  return template.replace(PLACEHOLDER_REGEX, (match, index: string) => {
    const arg = args[Number.parseInt(index, 10)];
    return arg === undefined ? match : String(arg);
  });
}

export function createMessageAccessor(resolver: MessageResolver): MessageAccessor {
  return {
    getString(key) {
      return resolver.resolve(key);
    },

    format(key, ...args) {
      const template = resolver.resolve(key);
      if (isMissingKeyMarker(template, key)) return template;
      return substitutePlaceholders(template, args);
    },
  };
}
