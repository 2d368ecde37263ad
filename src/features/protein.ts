import type { FeatureRecord, FormatOptions, IdentityTuple, ProteinSource, Strand } from "../types";
import { formatFeature } from "./format";
import { readAttribute, sliceOneBased } from "./source";

export interface ProteinFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly proteinId: string;
  readonly seq: string;
}

/**
 * Protein coordinates, in residues. `seq` is the amino acid sequence from
 * `start` to `end`, inclusive.
 */
export class Protein implements FeatureRecord, ProteinFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly proteinId: string;
  readonly seq: string;

  constructor(fields: ProteinFields) {
    this.contig = fields.contig;
    this.start = fields.start;
    this.end = fields.end;
    this.strand = fields.strand;
    this.biotype = fields.biotype;
    this.proteinId = fields.proteinId;
    this.seq = fields.seq;
    Object.freeze(this);
  }

  static load(source: ProteinSource, start: number, end: number): Protein {
    return new Protein({
      contig: readAttribute(source, "contig"),
      start,
      end,
      strand: readAttribute(source, "strand"),
      biotype: readAttribute(source, "biotype"),
      proteinId: readAttribute(source, "proteinId"),
      seq: sliceOneBased(readAttribute(source, "proteinSequence"), start, end),
    });
  }

  toIdentityTuple(): IdentityTuple {
    return [this.proteinId, this.start, this.end];
  }

  toString(options?: FormatOptions): string {
    return formatFeature("Protein", this, options);
  }
}
