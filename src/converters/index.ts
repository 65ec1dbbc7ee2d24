import type { MarketplaceTag } from "../types/canonical";
import type { MarketplaceConverter } from "./base";
import { amazonConverter } from "./amazon";
import { flipkartConverter } from "./flipkart";
import { meeshoConverter } from "./meesho";
import { tcsConverter } from "./tcs";
import { genericConverter } from "./generic";

export const CONVERTERS: Readonly<Record<MarketplaceTag, MarketplaceConverter>> = {
  amazon: amazonConverter,
  flipkart: flipkartConverter,
  meesho: meeshoConverter,
  tcs: tcsConverter,
  generic: genericConverter,
};

/**
 * File-name tokens, checked in this order; first hit wins. Generic is the fallback.
 */
export const FILENAME_PRIORITY: readonly Exclude<MarketplaceTag, "generic">[] = [
  "amazon",
  "flipkart",
  "meesho",
  "tcs",
];

export function isMarketplaceTag(val: string): val is MarketplaceTag {
  return Object.prototype.hasOwnProperty.call(CONVERTERS, val);
}

export { amazonConverter, flipkartConverter, meeshoConverter, tcsConverter, genericConverter };
export type { MarketplaceConverter, SynonymProfile, SemanticField, SynonymChain } from "./base";
