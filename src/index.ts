/**
 * transcript-features - coordinate-bearing feature records for transcripts
 *
 * Genes, transcripts, exons, CDSs and proteins built from a source
 * transcript and a 1-based inclusive coordinate pair, with a factory that
 * selects the feature type from a tag at runtime.
 */

// Error types
export { FeatureError, UnknownFeatureTypeError, ValidationError } from "./errors";
// Feature records and dispatch
export {
  CDS,
  type CdsFields,
  compareFeatures,
  DEFAULT_SEQ_LIMIT,
  Exon,
  type ExonFields,
  type FeatureLoader,
  type FeatureLoaderMap,
  formatFeature,
  Gene,
  type GeneFields,
  getLoader,
  identityKey,
  isFeatureType,
  Protein,
  type ProteinFields,
  sliceOneBased,
  Transcript,
  type TranscriptFields,
  uniqueFeatures,
} from "./features";
// Core types
export type {
  CodingSource,
  FeatureRecord,
  FeatureType,
  FormatOptions,
  GeneIdentity,
  GeneSource,
  IdentityTuple,
  ProteinIdentity,
  ProteinSource,
  SourceTranscript,
  Strand,
  TranscriptIdentity,
  TranscriptLocation,
  TranscriptSequences,
  TranscriptSource,
} from "./types";
export { FEATURE_TYPES, FormatOptionsSchema } from "./types";

/**
 * Library version
 */
export const VERSION = "0.1.0";
