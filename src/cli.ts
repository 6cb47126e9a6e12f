import { parseArgs as parseNodeArgs } from "node:util";

export type Command = "help" | "preview" | "runserver";

export interface CliOptions {
  command: Command;
  open: boolean;
  configPath?: string;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = `Usage:
  lanshare                      show the folder, URL and QR code, then exit
  lanshare runserver [options]  serve the folder until stopped

Options:
  -o, --open           open the page in a browser once the server is up
  -c, --config <file>  YAML config file (default: ./share.yaml when present)
  -h, --help           show this help`;

function parse(argv: string[]) {
  try {
    return parseNodeArgs({
      args: argv,
      allowPositionals: true,
      strict: true,
      options: {
        open: { type: "boolean", short: "o" },
        config: { type: "string", short: "c" },
        help: { type: "boolean", short: "h" },
      },
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseArgs(argv: string[]): CliOptions {
  const { values, positionals } = parse(argv);

  if (values.help) {
    return { command: "help", open: false };
  }
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }

  const [cmd] = positionals;
  if (cmd !== undefined && cmd !== "runserver") {
    throw new UsageError(`Unknown command: ${cmd}`);
  }

  return {
    command: cmd === "runserver" ? "runserver" : "preview",
    open: values.open ?? false,
    configPath: values.config,
  };
}

export function formatBanner(root: string, url: string, qr: string): string {
  const rule = "=".repeat(40);
  return [
    "",
    rule,
    " LAN SHARE",
    rule,
    ` Folder: ${root}`,
    ` URL:    ${url}`,
    "-".repeat(40),
    qr,
  ].join("\n");
}
