/**
 * Feature records and feature type dispatch
 *
 * @module features
 */

export { CDS, type CdsFields } from "./cds";
export { Exon, type ExonFields } from "./exon";
export {
  type FeatureLoader,
  type FeatureLoaderMap,
  getLoader,
  isFeatureType,
} from "./factory";
export { DEFAULT_SEQ_LIMIT, formatFeature } from "./format";
export { Gene, type GeneFields } from "./gene";
export { compareFeatures, identityKey, uniqueFeatures } from "./identity";
export { Protein, type ProteinFields } from "./protein";
export { readAttribute, sliceOneBased } from "./source";
export { Transcript, type TranscriptFields } from "./transcript";
