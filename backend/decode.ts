import { Either, ParseResult, Schema } from "effect";
import { ValidationError } from "./errors";

export function decodeOrThrow<A, I>(
  field: string,
  schema: Schema.Schema<A, I>,
  raw: unknown,
): A {
  const result = Schema.decodeUnknownEither(schema)(raw);
  if (Either.isRight(result)) return result.right;
  throw new ValidationError({
    field,
    message: ParseResult.TreeFormatter.formatErrorSync(result.left),
  });
}
