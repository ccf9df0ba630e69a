import type { BundleLayer, Locale } from "@nlsbridge/contracts";

export class MessageBundle {
  readonly resolvedFrom: ReadonlyArray<string>;
  private readonly entries: ReadonlyMap<string, string>;

  private constructor(
    readonly bundleName: string,
    readonly locale: Readonly<Locale>,
    entries: Map<string, string>,
    resolvedFrom: string[],
  ) {
    this.entries = entries;
    this.resolvedFrom = Object.freeze(resolvedFrom);
    Object.freeze(this);
  }

  static fromLayers(
    bundleName: string,
    locale: Locale,
    layers: ReadonlyArray<BundleLayer>,
  ): MessageBundle {
    const entries = new Map<string, string>();
    // most specific layer last, so it wins
    for (const layer of [...layers].reverse()) {
      for (const [key, value] of Object.entries(layer.mapping)) {
        entries.set(key, value);
      }
    }

    return new MessageBundle(
      bundleName,
      Object.freeze({ ...locale }),
      entries,
      layers.map((layer) => layer.suffix),
    );
  }

  get(key: string): string | undefined {
    return this.entries.get(key);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }
}
