// Command-line converter: reads marketplace reports, writes one Tally workbook.
// Run with `npm run convert -- --state "Uttar Pradesh" Amazon_B2B.csv`.

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import type { ConversionResult, SourceInput } from "./types/canonical";
import { convertAll } from "./engine/dispatcher";
import { isConversionError, describeError } from "./engine/errors";
import { readSourceTable } from "./sheets/reader";
import { outputFileName, writeWorkbook } from "./sheets/writer";
import { ConfigError, USAGE, loadConfig, type CliConfig } from "./config";
import { createLogger, setLogLevel } from "./utils/logger";
import { formatInr, pluralize } from "./utils/format";
import { round2 } from "./engine/normalize";

const log = createLogger("CLI");

async function loadInputs(config: CliConfig): Promise<SourceInput[]> {
  const inputs: SourceInput[] = [];
  for (const file of config.files) {
    const name = path.basename(file);
    try {
      const data = await readFile(file);
      inputs.push({ name, table: readSourceTable(data, name), tag: config.parser });
    } catch (err) {
      log.warn(`Skipping ${name}: ${describeError(err)}`);
    }
  }
  return inputs;
}

export async function run(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: CliConfig;
  try {
    config = loadConfig(argv, env);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`${err.message}\n\n${USAGE}`);
      return 1;
    }
    throw err;
  }

  if (config.help) {
    console.log(USAGE);
    return 0;
  }
  setLogLevel(config.logLevel);

  const inputs = await loadInputs(config);

  let result: ConversionResult;
  try {
    result = convertAll(inputs, config.sellerState);
  } catch (err) {
    if (isConversionError(err)) {
      log.error(err.message);
      return 1;
    }
    throw err;
  }

  const outPath = config.outFile ?? path.join(config.outDir, outputFileName());
  await writeFile(outPath, writeWorkbook(result));

  const taxable = round2(result.sales.reduce((sum, r) => sum + r["Amount"], 0));
  const tax = round2(result.sales.reduce((sum, r) => sum + r["Taxes"], 0));
  log.info(
    `Wrote ${pluralize(result.sales.length, "row")} to ${outPath} ` +
      `(taxable ${formatInr(taxable)}, tax ${formatInr(tax)})`
  );
  for (const w of result.warnings) {
    log.warn(`${w.file}: ${w.message}`);
  }
  return 0;
}

const entryScript = process.argv[1];
const invokedDirectly = entryScript !== undefined && import.meta.url === pathToFileURL(entryScript).href;

if (invokedDirectly) {
  run(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      log.error(`Unhandled error: ${describeError(err)}`);
      process.exitCode = 1;
    }
  );
}
