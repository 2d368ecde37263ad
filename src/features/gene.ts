import type { FeatureRecord, FormatOptions, GeneSource, IdentityTuple, Strand } from "../types";
import { formatFeature } from "./format";
import { readAttribute } from "./source";

export interface GeneFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly geneId: string;
  readonly geneName: string;
}

/**
 * Gene coordinates, relative to the contig. Genes carry no sequence.
 */
export class Gene implements FeatureRecord, GeneFields {
  readonly contig: string;
  readonly start: number;
  readonly end: number;
  readonly strand: Strand;
  readonly biotype: string;
  readonly geneId: string;
  readonly geneName: string;

  constructor(fields: GeneFields) {
    this.contig = fields.contig;
    this.start = fields.start;
    this.end = fields.end;
    this.strand = fields.strand;
    this.biotype = fields.biotype;
    this.geneId = fields.geneId;
    this.geneName = fields.geneName;
    Object.freeze(this);
  }

  static load(source: GeneSource, start: number, end: number): Gene {
    return new Gene({
      contig: readAttribute(source, "contig"),
      start,
      end,
      strand: readAttribute(source, "strand"),
      biotype: readAttribute(source, "biotype"),
      geneId: readAttribute(source, "geneId"),
      geneName: readAttribute(source, "geneName"),
    });
  }

  toIdentityTuple(): IdentityTuple {
    return [this.geneId, this.start, this.end];
  }

  toString(options?: FormatOptions): string {
    return formatFeature("Gene", this, options);
  }
}
