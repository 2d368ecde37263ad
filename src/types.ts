/**
 * Core type definitions for feature records and their source transcripts
 *
 * A source transcript is supplied by an upstream provider and is only ever
 * read. Each loader declares the narrow capability set it needs, so a
 * provider can hand a gene-only object to `Gene.load` without also faking
 * sequences it does not have.
 */

import { type } from "arktype";

/**
 * Strand orientation of a transcript on its contig
 */
export type Strand = "+" | "-";

/**
 * Feature type tags accepted by the factory
 */
export const FEATURE_TYPES = ["cds", "exon", "gene", "protein", "transcript"] as const;

/**
 * Type for feature type tags
 */
export type FeatureType = (typeof FEATURE_TYPES)[number];

/**
 * Identity triple keying a record within its feature type
 */
export type IdentityTuple = readonly [id: string, start: number, end: number];

/**
 * Placement and classification shared by every feature
 */
export interface TranscriptLocation {
  /** Reference sequence name (e.g. "1", "chrX", "MT") */
  readonly contig: string;
  readonly strand: Strand;
  /** Functional class annotation (e.g. "protein_coding") */
  readonly biotype: string;
}

export interface TranscriptIdentity {
  readonly transcriptId: string;
  readonly transcriptName: string;
}

export interface GeneIdentity {
  readonly geneId: string;
  readonly geneName: string;
}

export interface ProteinIdentity {
  readonly proteinId: string;
}

/**
 * Sequences a source transcript can be sliced from
 */
export interface TranscriptSequences {
  /** Full spliced transcript sequence */
  readonly sequence: string;
  /** Coding portion of the transcript sequence */
  readonly codingSequence: string;
  /** Translated amino acid sequence */
  readonly proteinSequence: string;
}

/** What `Gene.load` reads */
export interface GeneSource extends TranscriptLocation, GeneIdentity {}

/** What `Transcript.load` and `Exon.load` read */
export interface TranscriptSource
  extends TranscriptLocation,
    TranscriptIdentity,
    Pick<TranscriptSequences, "sequence"> {}

/** What `CDS.load` reads */
export interface CodingSource
  extends TranscriptLocation,
    TranscriptIdentity,
    Pick<TranscriptSequences, "codingSequence"> {}

/** What `Protein.load` reads */
export interface ProteinSource
  extends TranscriptLocation,
    ProteinIdentity,
    Pick<TranscriptSequences, "proteinSequence"> {}

/**
 * A source transcript able to back every feature type
 */
export interface SourceTranscript
  extends TranscriptLocation,
    TranscriptIdentity,
    GeneIdentity,
    ProteinIdentity,
    TranscriptSequences {}

/**
 * Behaviour shared by all five feature record variants
 */
export interface FeatureRecord {
  readonly contig: string;
  /** Start position (1-based, inclusive) in the source's coordinate space */
  readonly start: number;
  /** End position (1-based, inclusive) in the source's coordinate space */
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  /** Project onto the `(id, start, end)` triple used for sorting and deduplication */
  toIdentityTuple(): IdentityTuple;
  /** Debug rendering: `TypeName(field=value, ...)` with long sequences shortened */
  toString(options?: FormatOptions): string;
}

/**
 * Options for debug rendering of feature records
 */
export interface FormatOptions {
  /** Longest `seq` printed in full; longer ones are cut to this many characters */
  seqLimit?: number;
}

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

export const FormatOptionsSchema = type({
  "seqLimit?": "number.integer>=0 | undefined",
});
