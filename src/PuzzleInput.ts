/**
 * Text format for puzzles and solutions.
 *
 * A puzzle is a whitespace-separated list of integers:
 *
 * ```text
 * D P
 * s1 ... sD
 * t1 ... tD
 * ```
 *
 * where `D` is the number of disks, `P` the number of pegs, and `s`/`t` give
 * the start and target peg of each disk, smallest first, with pegs counted
 * from 1. Line breaks carry no meaning.
 *
 * @since 0.1.0
 */
import * as Effect from "effect/Effect"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import { InvalidInput } from "./HanoiError.js"
import type { Puzzle } from "./Puzzle.js"
import type { Solution } from "./Solver.js"

const Tokens = Schema.Array(Schema.NumberFromString.pipe(Schema.int()))

const invalid = (message: string) => new InvalidInput({ field: "input", message })

/**
 * Parses puzzle text into 0-based arrangements.
 *
 * Only the shape of the input is checked here; peg ranges are checked when
 * the puzzle is solved.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as PuzzleInput from "effect-hanoi/PuzzleInput"
 *
 * const puzzle = Effect.runSync(PuzzleInput.parse("2 3\n1 1\n3 3\n"))
 * // { diskCount: 2, pegCount: 3, start: [0, 0], target: [2, 2] }
 * ```
 *
 * @since 0.1.0
 * @category parsing
 */
export const parse = (text: string): Effect.Effect<Puzzle, InvalidInput> =>
  Effect.gen(function* () {
    const words = text.split(/\s+/).filter((word) => word.length > 0)
    const values = yield* Schema.decodeUnknown(Tokens)(words).pipe(
      Effect.mapError((error) => invalid(ParseResult.TreeFormatter.formatErrorSync(error)))
    )
    if (values.length < 2) {
      return yield* invalid("Expected the disk count and the peg count")
    }

    const [diskCount, pegCount] = values
    if (diskCount < 0) {
      return yield* invalid(`Disk count must not be negative, got ${diskCount}`)
    }
    const expected = 2 + 2 * diskCount
    if (values.length !== expected) {
      return yield* invalid(`Expected ${expected} integers for ${diskCount} disks, got ${values.length}`)
    }

    return {
      diskCount,
      pegCount,
      start: values.slice(2, 2 + diskCount).map((label) => label - 1),
      target: values.slice(2 + diskCount).map((label) => label - 1)
    }
  })

/**
 * Renders a solution: a `num moves = N` header, the count on its own line,
 * then one `disk peg` line per move.
 *
 * @since 0.1.0
 * @category formatting
 */
export const format = (solution: Solution): string =>
  [
    `num moves = ${solution.distance}`,
    `${solution.distance}`,
    ...solution.moves.map((move) => `${move.disk} ${move.peg}`)
  ].join("\n")
