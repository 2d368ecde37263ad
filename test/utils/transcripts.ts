/**
 * Shared source transcript fixtures
 */

import type { SourceTranscript } from "../../src/types";

export function createTestTranscript(overrides: Partial<SourceTranscript> = {}): SourceTranscript {
  return {
    contig: "12",
    strand: "-",
    biotype: "protein_coding",
    transcriptId: "ENST00000000101",
    transcriptName: "TEST1-201",
    geneId: "ENSG00000000101",
    geneName: "TEST1",
    proteinId: "ENSP00000000101",
    sequence: "GGCATGCCCTAAGTT",
    codingSequence: "ATGCCCTAA",
    proteinSequence: "MP",
    ...overrides,
  };
}
