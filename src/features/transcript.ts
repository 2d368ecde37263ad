import type {
  FeatureRecord,
  FormatOptions,
  IdentityTuple,
  Strand,
  TranscriptSource,
} from "../types";
import { formatFeature } from "./format";
import { readAttribute, sliceOneBased } from "./source";

export interface TranscriptFields {
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
 * Transcript coordinates
 *
 * `start` and `end` are relative to the spliced transcript, and `seq` is the
 * transcript sequence from `start` to `end`, inclusive.
 */
export class Transcript implements FeatureRecord, TranscriptFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly transcriptId: string;
  readonly transcriptName: string;
  readonly seq: string;

  constructor(fields: TranscriptFields) {
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

  static load(source: TranscriptSource, start: number, end: number): Transcript {
    return new Transcript({
      contig: readAttribute(source, "contig"),
      start,
      end,
      strand: readAttribute(source, "strand"),
      biotype: readAttribute(source, "biotype"),
      transcriptId: readAttribute(source, "transcriptId"),
      transcriptName: readAttribute(source, "transcriptName"),
      seq: sliceOneBased(readAttribute(source, "sequence"), start, end),
    });
  }

  toIdentityTuple(): IdentityTuple {
    return [this.transcriptId, this.start, this.end];
  }

  toString(options?: FormatOptions): string {
    return formatFeature("Transcript", this, options);
  }
}
