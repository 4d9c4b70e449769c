import { Schema } from "effect";
import { describe, expect, test } from "vitest";
import { decodeOrThrow } from "./decode";
import { ValidationError } from "./errors";
import { EntityId } from "./schema";

describe("decodeOrThrow", () => {
  const Args = Schema.Struct({
    id: EntityId,
    comment: Schema.optionalWith(Schema.String, { default: () => "" }),
  });

  test("returns the decoded value", () => {
    expect(decodeOrThrow("args", Args, { id: 3 })).toEqual({ id: 3, comment: "" });
  });

  test("throws a ValidationError naming the field", () => {
    expect(() => decodeOrThrow("args", Args, { id: -1 })).toThrow(ValidationError);

    try {
      decodeOrThrow("dccReviews:addDccReview", Args, { id: 1.5 });
      expect.fail("Should have thrown");
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe("dccReviews:addDccReview");
        expect(error.message).toContain('["id"]');
      }
    }
  });

  test("rejects missing required fields", () => {
    expect(() => decodeOrThrow("args", Args, {})).toThrow(ValidationError);
  });
});
