import type {
  FeatureRecord,
  FormatOptions,
  IdentityTuple,
  Strand,
  TranscriptSource,
} from "../types";
import { formatFeature } from "./format";
import { readAttribute, sliceOneBased } from "./source";

export interface ExonFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly exonId: string;
  readonly transcriptId: string;
  readonly transcriptName: string;
  /** Ordinal of the exon among all exons of the transcript */
  readonly index: number;
  readonly seq: string;
}

/**
 * Exon coordinates
 *
 * `start` and `end` are relative to the spliced transcript, and `seq` is the
 * transcript sequence from `start` to `end`, inclusive. The exon identifier,
 * ordinal and biotype come from the caller rather than the transcript, since
 * an exon can be annotated differently from its parent.
 */
export class Exon implements FeatureRecord, ExonFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly exonId: string;
  readonly transcriptId: string;
  readonly transcriptName: string;
  readonly index: number;
  readonly seq: string;

  constructor(fields: ExonFields) {
    this.contig = fields.contig;
    this.start = fields.start;
    this.end = fields.end;
    this.strand = fields.strand;
    this.biotype = fields.biotype;
    this.exonId = fields.exonId;
    this.transcriptId = fields.transcriptId;
    this.transcriptName = fields.transcriptName;
    this.index = fields.index;
    this.seq = fields.seq;
    Object.freeze(this);
  }

  static load(
    source: TranscriptSource,
    start: number,
    end: number,
    biotype: string,
    exonId: string,
    index: number
  ): Exon {
    return new Exon({
      contig: readAttribute(source, "contig"),
      start,
      end,
      strand: readAttribute(source, "strand"),
      biotype,
      exonId,
      transcriptId: readAttribute(source, "transcriptId"),
      transcriptName: readAttribute(source, "transcriptName"),
      index,
      seq: sliceOneBased(readAttribute(source, "sequence"), start, end),
    });
  }

  toIdentityTuple(): IdentityTuple {
    return [this.exonId, this.start, this.end];
  }

  toString(options?: FormatOptions): string {
    return formatFeature("Exon", this, options);
  }
}
