// CLI flags take precedence over environment variables.
//   TALLY_SELLER_STATE  default for --state
//   TALLY_OUT_DIR       directory for the generated workbook (default: cwd)
//   TALLY_LOG_LEVEL     debug | info | warn | error | silent

import { parseArgs } from "node:util";
import path from "node:path";
import type { MarketplaceTag } from "./types/canonical";
import { isMarketplaceTag } from "./converters";
import { isLogLevel, type LogLevel } from "./utils/logger";

export interface CliConfig {
  sellerState: string;          // May be empty; convertAll rejects it
  files: string[];
  outFile?: string;             // Explicit --out path
  outDir: string;
  parser?: MarketplaceTag;      // Forces one converter for every file
  logLevel: LogLevel;
  help: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const USAGE = [
  "Usage: tally-convert --state <seller state> [options] <file.csv|file.xlsx> ...",
  "",
  "Options:",
  "  -s, --state <name>     Seller's state, used for the CGST/SGST vs IGST split",
  "  -p, --parser <tag>     Force a converter: amazon, flipkart, meesho, tcs, generic",
  "  -o, --out <file>       Output workbook (default: tally_vouchers_<timestamp>.xlsx)",
  "  -q, --quiet            Only log errors",
  "  -h, --help             Show this help",
  "",
  'Example: tally-convert --state "Uttar Pradesh" Amazon_B2B.csv flipkart_sales.xlsx',
].join("\n");

const CLI_OPTIONS = {
  state: { type: "string", short: "s" },
  parser: { type: "string", short: "p" },
  out: { type: "string", short: "o" },
  quiet: { type: "boolean", short: "q" },
  help: { type: "boolean", short: "h" },
} as const;

function parseCli(argv: string[]) {
  try {
    return parseArgs({ args: argv, allowPositionals: true, options: CLI_OPTIONS });
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): CliConfig {
  const parsed = parseCli(argv);
  const { values, positionals } = parsed;
  const help = values.help ?? false;

  let parser: MarketplaceTag | undefined;
  if (values.parser !== undefined) {
    const tag = values.parser.trim().toLowerCase();
    if (!isMarketplaceTag(tag)) {
      throw new ConfigError(`Unknown parser: ${values.parser}`);
    }
    parser = tag;
  }

  const envLevel = env.TALLY_LOG_LEVEL;
  const logLevel: LogLevel = values.quiet ? "error" : isLogLevel(envLevel) ? envLevel : "info";

  if (!help && positionals.length === 0) {
    throw new ConfigError("No input files given");
  }

  return {
    sellerState: (values.state ?? env.TALLY_SELLER_STATE ?? "").trim(),
    files: positionals,
    outFile: values.out,
    outDir: path.resolve(env.TALLY_OUT_DIR ?? "."),
    parser,
    logLevel,
    help,
  };
}
