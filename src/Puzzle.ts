/**
 * Core puzzle types shared by every module.
 *
 * A puzzle is described by its dimensions (how many disks, how many pegs) and
 * two arrangements. Disks are identified by rank, where rank 0 is the
 * smallest disk; pegs by a 0-based id. Moves leave the library 1-based, the
 * way the puzzle is conventionally written down.
 *
 * @since 0.1.0
 */
import * as Effect from "effect/Effect"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import { InvalidInput } from "./HanoiError.js"

// =============================================================================
// Schemas
// =============================================================================

/**
 * Schema for the size of a puzzle.
 *
 * Zero disks is a legal (trivial) puzzle; at least one peg is required.
 *
 * @since 0.1.0
 * @category schemas
 */
export const Dimensions = Schema.Struct({
  diskCount: Schema.Int.pipe(Schema.nonNegative()),
  pegCount: Schema.Int.pipe(Schema.positive())
}).pipe(
  Schema.annotations({
    identifier: "Dimensions",
    title: "Puzzle Dimensions"
  })
)

/**
 * @since 0.1.0
 * @category models
 */
export type Dimensions = typeof Dimensions.Type

// =============================================================================
// Models
// =============================================================================

/**
 * An unvalidated puzzle, as handed over by input parsing.
 *
 * Arrangements hold 0-based peg ids indexed by disk rank.
 *
 * @since 0.1.0
 * @category models
 */
export interface Puzzle {
  readonly diskCount: number
  readonly pegCount: number
  readonly start: ReadonlyArray<number>
  readonly target: ReadonlyArray<number>
}

/**
 * A single-disk move: the disk rank and the destination peg, both 0-based.
 *
 * @since 0.1.0
 * @category models
 */
export interface Move {
  readonly disk: number
  readonly peg: number
}

/**
 * A move in puzzle notation: disk size label and destination peg label,
 * both counted from 1.
 *
 * @since 0.1.0
 * @category models
 */
export interface MoveLabel {
  readonly disk: number
  readonly peg: number
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const move = (disk: number, peg: number): Move => ({ disk, peg })

/**
 * Converts a 0-based move into puzzle notation.
 *
 * @example
 * ```ts
 * import { move, toLabel } from "effect-hanoi/Puzzle"
 *
 * toLabel(move(0, 2)) // { disk: 1, peg: 3 }
 * ```
 *
 * @since 0.1.0
 * @category conversions
 */
export const toLabel = (self: Move): MoveLabel => ({ disk: self.disk + 1, peg: self.peg + 1 })

/**
 * Decodes untrusted dimensions, failing with `InvalidInput`.
 *
 * @since 0.1.0
 * @category decoding
 */
export const decodeDimensions = (input: unknown): Effect.Effect<Dimensions, InvalidInput> =>
  Schema.decodeUnknown(Dimensions)(input).pipe(
    Effect.mapError((error) =>
      new InvalidInput({
        field: "dimensions",
        message: ParseResult.TreeFormatter.formatErrorSync(error)
      })
    )
  )
