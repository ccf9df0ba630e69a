import {
  BadRequestError,
  parseOrThrowBadRequest,
  toErrorBody,
} from "@nlsbridge/application";
import { localeTagSchema, type Locale } from "@nlsbridge/contracts";
import { parseLocale } from "@nlsbridge/domain";
import { describeError } from "@nlsbridge/shared";
import { parseArgs } from "node:util";
import {
  createCliCompositionRoot,
  type CliCompositionRoot,
} from "./bootstrap/composition-root.js";

export const USAGE = `Usage: nls-resolve --bundle <name> [--locale <tag>] [--show-keys] [--json] <key...>

Resolves each key against the named message bundle and prints one message
per line. Missing keys print as !key!.

Options:
  -b, --bundle <name>   bundle name, e.g. com.example.app.messages
  -l, --locale <tag>    locale such as de-DE (default: NLS_LOCALE, then LANG)
      --show-keys       print keys instead of messages
      --json            print a JSON object of key to message
  -h, --help            show this help`;

export interface ResolveInvocation {
  kind: "resolve";
  bundleName: string;
  keys: string[];
  locale?: Locale;
  showMessageKeys?: boolean;
  json: boolean;
}

export type CliInvocation = { kind: "help" } | ResolveInvocation;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface RunCliDeps {
  io?: CliIo;
  createRoot?: () => CliCompositionRoot;
}

const stdio: CliIo = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        bundle: { type: "string", short: "b" },
        locale: { type: "string", short: "l" },
        "show-keys": { type: "boolean" },
        json: { type: "boolean" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (error) {
    throw new BadRequestError(describeError(error));
  }
}

export function parseCliArgs(argv: string[]): CliInvocation {
  const { values, positionals } = readArgs(argv);

  if (values.help) return { kind: "help" };

  if (!values.bundle) {
    throw new BadRequestError("--bundle is required");
  }
  if (positionals.length === 0) {
    throw new BadRequestError("At least one message key is required");
  }

  const invocation: ResolveInvocation = {
    kind: "resolve",
    bundleName: values.bundle,
    keys: positionals,
    json: values.json ?? false,
  };

  if (values.locale !== undefined) {
    invocation.locale = parseLocale(
      parseOrThrowBadRequest(localeTagSchema, values.locale, "Invalid --locale"),
    );
  }
  if (values["show-keys"]) invocation.showMessageKeys = true;

  return invocation;
}

export async function runCli(
  argv: string[],
  deps: RunCliDeps = {},
): Promise<number> {
  const io = deps.io ?? stdio;
  let root: CliCompositionRoot | null = null;

  try {
    const invocation = parseCliArgs(argv);
    if (invocation.kind === "help") {
      io.stdout(USAGE);
      return 0;
    }

    root = (deps.createRoot ?? createCliCompositionRoot)();
    const resolver = await root.createResolver(invocation.bundleName, {
      ...(invocation.locale !== undefined ? { locale: invocation.locale } : {}),
      ...(invocation.showMessageKeys !== undefined
        ? { showMessageKeys: invocation.showMessageKeys }
        : {}),
    });

    const resolved = invocation.keys.map(
      (key) => [key, resolver.resolve(key)] as const,
    );

    if (invocation.json) {
      io.stdout(JSON.stringify(Object.fromEntries(resolved), null, 2));
    } else {
      for (const [, message] of resolved) io.stdout(message);
    }
    return 0;
  } catch (error) {
    const body = toErrorBody(error);
    if (body.code === "INTERNAL_ERROR") {
      root?.logger.error("resolution failed", { reason: describeError(error) });
    }
    io.stderr(JSON.stringify(body));
    return 1;
  } finally {
    await root?.close();
  }
}
