import { describe, expect, test } from "vitest";
import { CDS } from "../../src/features/cds";
import { Exon } from "../../src/features/exon";
import { compareFeatures, identityKey, uniqueFeatures } from "../../src/features/identity";
import { createTestTranscript } from "../utils/transcripts";

describe("Identity helpers", () => {
  const tx = createTestTranscript();
  const otherTx = createTestTranscript({ transcriptId: "ENST00000000099" });

  test("identityKey joins the identity tuple", () => {
    expect(identityKey(Exon.load(tx, 1, 120, "protein_coding", "ENSE001", 1))).toBe(
      "ENSE001:1-120"
    );
    expect(identityKey(CDS.load(tx, 4, 9))).toBe("ENST00000000101:4-9");
  });

  test("compareFeatures orders by ID, then start, then end", () => {
    const records = [
      CDS.load(tx, 4, 9),
      CDS.load(tx, 1, 9),
      CDS.load(otherTx, 7, 9),
      CDS.load(tx, 1, 3),
    ];

    const sorted = [...records].sort(compareFeatures).map((record) => record.toIdentityTuple());

    expect(sorted).toEqual([
      ["ENST00000000099", 7, 9],
      ["ENST00000000101", 1, 3],
      ["ENST00000000101", 1, 9],
      ["ENST00000000101", 4, 9],
    ]);
  });

  test("uniqueFeatures keeps the first record per identity tuple", () => {
    const first = Exon.load(tx, 1, 3, "protein_coding", "ENSE001", 1);
    const relabelled = Exon.load(tx, 1, 3, "retained_intron", "ENSE001", 4);
    const other = Exon.load(tx, 4, 6, "protein_coding", "ENSE002", 2);

    const unique = uniqueFeatures([first, other, relabelled]);

    expect(unique).toHaveLength(2);
    expect(unique[0]).toBe(first);
    expect(unique[1]).toBe(other);
  });

  test("records of the same variant and range from different sources stay distinct", () => {
    expect(uniqueFeatures([CDS.load(tx, 1, 3), CDS.load(otherTx, 1, 3)])).toHaveLength(2);
  });
});
