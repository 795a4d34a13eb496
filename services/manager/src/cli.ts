import { parseArgs } from "node:util";

export type CliCommand =
  | { kind: "serve" }
  | { kind: "connect"; id: string; username?: string; keyPath?: string }
  | { kind: "usage"; message: string };

export const USAGE = "usage: microvm-manager [connect <id> [--user <name>] --key <path>]";

/** Interprets `process.argv.slice(2)`. No arguments means "run the HTTP server". */
export function parseCli(args: string[]): CliCommand {
  if (args.length === 0 || args[0] === "serve") {
    return { kind: "serve" };
  }
  if (args[0] !== "connect") {
    return { kind: "usage", message: `Unknown command: ${args[0]}\n${USAGE}` };
  }

  let parsed: ReturnType<typeof parseConnectArgs>;
  try {
    parsed = parseConnectArgs(args.slice(1));
  } catch (err) {
    return { kind: "usage", message: `${err instanceof Error ? err.message : String(err)}\n${USAGE}` };
  }

  const [id] = parsed.positionals;
  if (!id || parsed.positionals.length > 1) {
    return { kind: "usage", message: USAGE };
  }
  return { kind: "connect", id, username: parsed.values.user, keyPath: parsed.values.key };
}

function parseConnectArgs(args: string[]) {
  return parseArgs({
    args,
    allowPositionals: true,
    options: {
      user: { type: "string", short: "u" },
      key: { type: "string", short: "k" }
    }
  });
}
