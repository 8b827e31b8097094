/**
 * Failures surfaced by the solver.
 *
 * @since 0.1.0
 */
import * as Schema from "effect/Schema"

/**
 * Malformed dimensions, arrangement or input text. Raised before any search
 * starts.
 *
 * @since 0.1.0
 * @category errors
 */
export class InvalidInput extends Schema.TaggedError<InvalidInput>("effect-hanoi/InvalidInput")(
  "InvalidInput",
  {
    field: Schema.Literal("input", "dimensions", "start", "target"),
    message: Schema.String
  }
) { }

/**
 * The target arrangement cannot be reached from the start arrangement.
 *
 * @since 0.1.0
 * @category errors
 */
export class NoPath extends Schema.TaggedError<NoPath>("effect-hanoi/NoPath")(
  "NoPath",
  {
    explored: Schema.Number,
    message: Schema.String
  }
) { }

/**
 * Predecessor links disagree with the recorded distance. Indicates a defect in
 * the search bookkeeping, never bad input.
 *
 * @since 0.1.0
 * @category errors
 */
export class BrokenChain extends Schema.TaggedError<BrokenChain>("effect-hanoi/BrokenChain")(
  "BrokenChain",
  {
    vertex: Schema.Number,
    step: Schema.Number,
    distance: Schema.Number,
    message: Schema.String
  }
) { }

/**
 * The search materialized more vertices than the configured limit allows.
 *
 * @since 0.1.0
 * @category errors
 */
export class SearchLimitExceeded extends Schema.TaggedError<SearchLimitExceeded>("effect-hanoi/SearchLimitExceeded")(
  "SearchLimitExceeded",
  {
    limit: Schema.Number,
    message: Schema.String
  }
) { }

/**
 * @since 0.1.0
 * @category errors
 */
export type SolveError = InvalidInput | NoPath | BrokenChain | SearchLimitExceeded
