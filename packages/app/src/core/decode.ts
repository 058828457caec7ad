import * as S from "@effect/schema/Schema"
import * as TreeFormatter from "@effect/schema/TreeFormatter"
import * as Either from "effect/Either"

import type { ParseError, SchemaError } from "./errors.js"
import { schemaError } from "./errors.js"
import { parse } from "./parser.js"
import { toNative } from "./value.js"

// CHANGE: validate strictly parsed documents against an @effect/schema schema
// WHY: callers want typed data, and Schema.parseJson would bypass the strict grammar
// REF: req-decode-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: decodeWith(s)(t) = Right(a) → parse(t) = Right(v) ∧ decode(s)(toNative(v)) = Right(a)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: grammar errors surface as ParseError, shape errors as SchemaError
// COMPLEXITY: O(n)

export type DecodeError = ParseError | SchemaError

/**
 * Build a decoder that parses text and then validates it with `schema`.
 *
 * @pure true
 * @complexity O(n)
 */
export const decodeWith = <A, I>(
  schema: S.Schema<A, I>
): (text: string) => Either.Either<A, DecodeError> => {
  const decode = S.decodeUnknownEither(schema)
  return (text) => {
    const parsed = parse(text)
    if (Either.isLeft(parsed)) {
      return Either.left(parsed.left)
    }
    return Either.mapLeft(
      decode(toNative(parsed.right)),
      (error) => schemaError(TreeFormatter.formatErrorSync(error))
    )
  }
}
