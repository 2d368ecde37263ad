import type {
  CodingSource,
  FeatureRecord,
  FormatOptions,
  IdentityTuple,
  Strand,
} from "../types";
import { formatFeature } from "./format";
import { readAttribute, sliceOneBased } from "./source";

export interface CdsFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly transcriptId: string;
  readonly transcriptName: string;
  readonly seq: string;
}

/**
 * Coding sequence coordinates
 *
 * `start` and `end` are relative to the CDS of the transcript, and `seq` is
 * the coding sequence from `start` to `end`, inclusive.
 */
export class CDS implements FeatureRecord, CdsFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly transcriptId: string;
  readonly transcriptName: string;
  readonly seq: string;

  constructor(fields: CdsFields) {
    this.contig = fields.contig;
    this.start = fields.start;
    this.end = fields.end;
    this.strand = fields.strand;
    this.biotype = fields.biotype;
    this.transcriptId = fields.transcriptId;
    this.transcriptName = fields.transcriptName;
    this.seq = fields.seq;
    Object.freeze(this);
  }

  /**
   * Build a CDS record from a transcript and CDS-relative coordinates
   *
   * @param biotype - Overrides the transcript's own biotype when given
   */
  static load(source: CodingSource, start: number, end: number, biotype?: string): CDS {
    return new CDS({
      contig: readAttribute(source, "contig"),
      start,
      end,
      strand: readAttribute(source, "strand"),
      biotype: biotype ?? readAttribute(source, "biotype"),
      transcriptId: readAttribute(source, "transcriptId"),
      transcriptName: readAttribute(source, "transcriptName"),
      seq: sliceOneBased(readAttribute(source, "codingSequence"), start, end),
    });
  }

  toIdentityTuple(): IdentityTuple {
    return [this.transcriptId, this.start, this.end];
  }

  toString(options?: FormatOptions): string {
    return formatFeature("CDS", this, options);
  }
}
