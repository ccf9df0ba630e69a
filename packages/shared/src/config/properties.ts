export interface PropertySource {
  get(name: string): string | undefined;
}

export function createEnvPropertySource(
  env: NodeJS.ProcessEnv = process.env,
): PropertySource {
  return {
    get(name: string): string | undefined {
      let raw: string | undefined;
      try {
        raw = env[name];
      } catch {
        return undefined;
      }

      const value = raw?.trim();
      return value ? value : undefined;
    },
  };
}

export function firstProperty(
  source: PropertySource,
  names: ReadonlyArray<string>,
): string | undefined {
  for (const name of names) {
    const value = source.get(name);
    if (value !== undefined) return value;
  }
  return undefined;
}

const TRUE_VALUES = new Set(["true", "1", "yes", "on"]);
const FALSE_VALUES = new Set(["false", "0", "no", "off"]);

export function parseBooleanFlag(raw: string | undefined): boolean | undefined {
  if (raw === undefined) return undefined;
  const normalized = raw.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return undefined;
}
