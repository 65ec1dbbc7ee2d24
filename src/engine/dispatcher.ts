// ══ Dispatcher: pick a converter per file, run them all, combine ═════════════

import type {
  ConversionMetadata,
  ConversionResult,
  ConversionWarning,
  MarketplaceTag,
  SourceInput,
  TallyRow,
} from "../types/canonical";
import { CONVERTERS, FILENAME_PRIORITY, type MarketplaceConverter } from "../converters";
import { ConversionError, describeError } from "./errors";
import { createLogger } from "../utils/logger";

const log = createLogger("Dispatcher");

export interface ConvertOptions {
  /** Clock for the metadata timestamp. */
  now?: () => Date;
}

export function getConverter(tag: MarketplaceTag): MarketplaceConverter {
  return CONVERTERS[tag];
}

/**
 * Case-insensitive substring match on the file name:
 * amazon → flipkart → meesho → tcs, else generic.
 */
export function selectConverter(fileName: string): MarketplaceConverter {
  const lower = fileName.toLowerCase();
  const tag = FILENAME_PRIORITY.find((t) => lower.includes(t)) ?? "generic";
  return CONVERTERS[tag];
}

/**
 * "2024-01-15 10:20:30 UTC"
 */
export function formatUtcTimestamp(d: Date): string {
  return d.toISOString().slice(0, 19).replace("T", " ") + " UTC";
}

export function convertAll(
  inputs: SourceInput[],
  sellerState: string,
  options: ConvertOptions = {}
): ConversionResult {
  const state = sellerState.trim();
  if (!state) {
    throw new ConversionError(
      "MISSING_SELLER_STATE",
      "Seller state is required to correctly split GST (CGST/SGST vs IGST)."
    );
  }

  const sales: TallyRow[] = [];
  const sourceFiles: string[] = [];
  const warnings: ConversionWarning[] = [];

  for (const input of inputs) {
    const converter = input.tag ? getConverter(input.tag) : selectConverter(input.name);
    log.debug(`Using ${converter.label} converter for ${input.name}`);

    let rows: TallyRow[];
    try {
      rows = converter.convert(input.table, state).rows;
    } catch (err) {
      const message = `${converter.label} converter failed: ${describeError(err)}`;
      log.warn(`Skipping ${input.name}: ${message}`);
      warnings.push({ file: input.name, severity: "warn", source: converter.label, message });
      continue;
    }

    if (rows.length === 0) {
      const message = `${converter.label} converter returned no rows`;
      log.info(`Skipping ${input.name}: ${message}`);
      warnings.push({ file: input.name, severity: "warn", source: converter.label, message });
      continue;
    }

    sales.push(...rows);
    sourceFiles.push(input.name);
    log.info(`Converted ${input.name} (${converter.label}): ${rows.length} rows`);
  }

  if (sales.length === 0) {
    throw new ConversionError(
      "NO_ROWS",
      "No valid data parsed from uploaded files. Check file formats or column names."
    );
  }

  const metadata: ConversionMetadata = {
    generatedOn: formatUtcTimestamp((options.now ?? (() => new Date()))()),
    sourceFiles: sourceFiles.join(", "),
    sellerState: state,
  };

  return { sales, salesReturn: [], metadata, warnings };
}
