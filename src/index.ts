export * from "./types/canonical";
export { parseDate, coerceNumber, round2 } from "./engine/normalize";
export { splitTax, isSameState, DEFAULT_GST_RATE, type TaxSplit } from "./engine/gst";
export { buildRow, type RowFields } from "./engine/rowBuilder";
export { convertAll, selectConverter, getConverter, type ConvertOptions } from "./engine/dispatcher";
export { ConversionError, isConversionError, type ConversionErrorCode } from "./engine/errors";
export {
  CONVERTERS,
  amazonConverter,
  flipkartConverter,
  meeshoConverter,
  tcsConverter,
  genericConverter,
  type MarketplaceConverter,
  type SynonymProfile,
  type SemanticField,
} from "./converters";
export { resolveField } from "./converters/base";
export { readSourceTable, SUPPORTED_EXTENSIONS } from "./sheets/reader";
export { buildWorkbook, writeWorkbook, outputFileName } from "./sheets/writer";
