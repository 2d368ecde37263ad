/**
 * Feature type dispatch
 *
 * Maps a feature type tag to the matching record's `load` function so that
 * pipeline code can pick a feature type from configuration or a command-line
 * argument without branching on it.
 *
 * @module features/factory
 */

import { UnknownFeatureTypeError } from "../errors";
import { FEATURE_TYPES, type FeatureRecord, type FeatureType } from "../types";
import { CDS } from "./cds";
import { Exon } from "./exon";
import { Gene } from "./gene";
import { Protein } from "./protein";
import { Transcript } from "./transcript";

const FEATURE_LOADERS = {
  cds: CDS.load,
  exon: Exon.load,
  gene: Gene.load,
  protein: Protein.load,
  transcript: Transcript.load,
} as const satisfies Record<FeatureType, (...args: never[]) => FeatureRecord>;

/**
 * Loader signature for each feature type tag
 */
export type FeatureLoaderMap = typeof FEATURE_LOADERS;

/**
 * Any of the five loaders
 */
export type FeatureLoader = FeatureLoaderMap[FeatureType];

/**
 * Check whether a string is one of the known feature type tags (exact, case-sensitive)
 */
export function isFeatureType(value: string): value is FeatureType {
  return FEATURE_TYPES.some((featureType) => featureType === value);
}

/**
 * Get the load function for a feature type
 *
 * The caller supplies the argument set of the loader it asked for; the
 * returned function is not invoked or checked here.
 *
 * @example
 * ```typescript
 * const load = getLoader("cds");
 * const cds = load(transcript, 1, 3);
 *
 * getLoader("CDS"); // throws UnknownFeatureTypeError
 * ```
 *
 * @throws {UnknownFeatureTypeError} When the tag is not a known feature type
 */
export function getLoader<T extends FeatureType>(featureType: T): FeatureLoaderMap[T];
export function getLoader(featureType: string): FeatureLoader;
export function getLoader(featureType: string): FeatureLoader {
  if (!isFeatureType(featureType)) {
    throw new UnknownFeatureTypeError(featureType, FEATURE_TYPES);
  }
  return FEATURE_LOADERS[featureType];
}
