/**
 * Peg arrangements.
 *
 * A state assigns every disk to a peg. It is indexed by disk rank, so the
 * stacking order on each peg is implied by rank and never stored: the
 * smallest-ranked disk on a peg is the one on top.
 *
 * States are structurally equal and hashable (they are built with
 * `Data.array`), which lets them key hash maps directly.
 *
 * @since 0.1.0
 */
import * as Arr from "effect/Array"
import * as Brand from "effect/Brand"
import * as Data from "effect/Data"
import * as Effect from "effect/Effect"
import * as Equal from "effect/Equal"
import { dual } from "effect/Function"
import * as ParseResult from "effect/ParseResult"
import * as Schema from "effect/Schema"
import { InvalidInput } from "./HanoiError.js"
import type { Dimensions } from "./Puzzle.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Immutable assignment of disks (by rank) to pegs.
 *
 * @since 0.1.0
 * @category models
 */
export type State = Brand.Branded<ReadonlyArray<number>, "State">

// =============================================================================
// Constructors
// =============================================================================

const nominal = Brand.nominal<State>()

/**
 * Creates a state from peg ids listed by disk rank.
 *
 * @example
 * ```ts
 * import * as State from "effect-hanoi/State"
 *
 * // smallest disk on peg 1, the other two on peg 0
 * const state = State.make([1, 0, 0])
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (pegs: Iterable<number>): State => nominal(Data.array(Arr.fromIterable(pegs)))

/**
 * All disks stacked on a single peg.
 *
 * @since 0.1.0
 * @category constructors
 */
export const uniform = (diskCount: number, peg: number): State =>
  make(globalThis.Array.from({ length: diskCount }, () => peg))

/**
 * Returns a new state with `disk` relocated to `peg`.
 *
 * @since 0.1.0
 * @category combinators
 */
export const withDisk: {
  (disk: number, peg: number): (self: State) => State
  (self: State, disk: number, peg: number): State
} = dual(3, (self: State, disk: number, peg: number): State => make(Arr.replace(self, disk, peg)))

// =============================================================================
// Getters
// =============================================================================

/**
 * @since 0.1.0
 * @category equivalence
 */
export const equals = (self: State, that: State): boolean => Equal.equals(self, that)

/**
 * Peg labels counted from 1, in disk rank order.
 *
 * @since 0.1.0
 * @category conversions
 */
export const toLabels = (self: State): Array<number> => Arr.map(self, (peg) => peg + 1)

// =============================================================================
// Validation
// =============================================================================

/**
 * Schema accepting exactly `diskCount` integer peg ids in `[0, pegCount)`.
 *
 * @since 0.1.0
 * @category schemas
 */
export const schema = (dimensions: Dimensions) =>
  Schema.Array(Schema.Int.pipe(Schema.between(0, dimensions.pegCount - 1))).pipe(
    Schema.itemsCount(dimensions.diskCount)
  )

/**
 * Decodes an untrusted arrangement into a state.
 *
 * @since 0.1.0
 * @category validation
 */
export const validate = (
  dimensions: Dimensions,
  pegs: unknown,
  field: "start" | "target"
): Effect.Effect<State, InvalidInput> =>
  Schema.decodeUnknown(schema(dimensions))(pegs).pipe(
    Effect.map(make),
    Effect.mapError((error) =>
      new InvalidInput({
        field,
        message: ParseResult.TreeFormatter.formatErrorSync(error)
      })
    )
  )
