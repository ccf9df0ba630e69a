import { resolveMessage, type MessageResolver } from "@nlsbridge/domain";

export interface InMemoryMessageResolverOptions {
  showMessageKeys?: boolean;
}

export class InMemoryMessageResolver implements MessageResolver {
  private readonly entries: ReadonlyMap<string, string>;
  readonly showMessageKeys: boolean;

  constructor(
    entries: Readonly<Record<string, string>>,
    options: InMemoryMessageResolverOptions = {},
  ) {
    this.entries = new Map(Object.entries(entries));
    this.showMessageKeys = options.showMessageKeys ?? false;
  }

  resolve(key: string): string {
    return resolveMessage(
      (candidate) => this.entries.get(candidate),
      key,
      this.showMessageKeys,
    );
  }
}
