import { describe, expect, test } from "vitest";
import { FeatureError, UnknownFeatureTypeError, ValidationError } from "../src/errors";

describe("Error types", () => {
  test("UnknownFeatureTypeError is a TypeError naming the tag", () => {
    const error = new UnknownFeatureTypeError("utr", ["cds", "exon"]);

    expect(error).toBeInstanceOf(TypeError);
    expect(error).toBeInstanceOf(Error);
    expect(error).not.toBeInstanceOf(FeatureError);
    expect(error.name).toBe("UnknownFeatureTypeError");
    expect(error.code).toBe("UNKNOWN_FEATURE_TYPE");
    expect(error.featureType).toBe("utr");
    expect(error.toString()).toBe(
      "UnknownFeatureTypeError: Could not get load function for feature type 'utr'\n" +
        "Context: Known feature types: cds, exon"
    );
  });

  test("ValidationError is a FeatureError", () => {
    const error = new ValidationError("seqLimit must be a non-negative integer", "format options");

    expect(error).toBeInstanceOf(FeatureError);
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.toString()).toBe(
      "ValidationError: seqLimit must be a non-negative integer\nContext: format options"
    );
  });

  test("ValidationError without context", () => {
    expect(new ValidationError("bad input").toString()).toBe("ValidationError: bad input");
  });
});
