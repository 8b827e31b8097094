/**
 * Legal moves of the generalized Tower of Hanoi.
 *
 * Disk rank stands in for a per-peg stack: a disk is on top of its peg when no
 * smaller-ranked disk shares that peg, and it may land on any other peg that
 * holds no smaller-ranked disk.
 *
 * @since 0.1.0
 */
import { dual } from "effect/Function"
import * as Option from "effect/Option"
import type { Move } from "./Puzzle.js"
import * as State from "./State.js"

// =============================================================================
// Models
// =============================================================================

/**
 * A legal move together with the state it produces.
 *
 * @since 0.1.0
 * @category models
 */
export interface Transition {
  readonly move: Move
  readonly state: State.State
}

// =============================================================================
// Predicates
// =============================================================================

/**
 * Whether any disk smaller than `disk` sits on `peg`.
 *
 * @since 0.1.0
 * @category predicates
 */
export const pegHasSmallerDisk = (state: State.State, disk: number, peg: number): boolean => {
  for (let rank = disk - 1; rank >= 0; rank--) {
    if (state[rank] === peg) {
      return true
    }
  }
  return false
}

/**
 * Whether `disk` is the topmost disk on its peg.
 *
 * @since 0.1.0
 * @category predicates
 */
export const isTopmost = (state: State.State, disk: number): boolean =>
  !pegHasSmallerDisk(state, disk, state[disk])

/**
 * @since 0.1.0
 * @category predicates
 */
export const isLegal = (state: State.State, move: Move, pegCount: number): boolean =>
  Number.isInteger(move.disk) &&
  Number.isInteger(move.peg) &&
  move.disk >= 0 &&
  move.disk < state.length &&
  move.peg >= 0 &&
  move.peg < pegCount &&
  move.peg !== state[move.disk] &&
  isTopmost(state, move.disk) &&
  !pegHasSmallerDisk(state, move.disk, move.peg)

// =============================================================================
// Operations
// =============================================================================

/**
 * Lazily enumerates every legal move from `state`, ordered by disk rank and
 * then by destination peg.
 *
 * @example
 * ```ts
 * import * as MoveRule from "effect-hanoi/MoveRule"
 * import * as State from "effect-hanoi/State"
 *
 * for (const { move } of MoveRule.legalMoves(State.make([0, 0]), 3)) {
 *   console.log(move) // { disk: 0, peg: 1 }, then { disk: 0, peg: 2 }
 * }
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export function* legalMoves(state: State.State, pegCount: number): Generator<Transition, void, undefined> {
  for (let disk = 0; disk < state.length; disk++) {
    if (!isTopmost(state, disk)) {
      continue
    }
    for (let peg = 0; peg < pegCount; peg++) {
      if (peg === state[disk] || pegHasSmallerDisk(state, disk, peg)) {
        continue
      }
      yield { move: { disk, peg }, state: State.withDisk(state, disk, peg) }
    }
  }
}

/**
 * Applies `move` if it is legal from `self`.
 *
 * @since 0.1.0
 * @category operations
 */
export const apply: {
  (move: Move, pegCount: number): (self: State.State) => Option.Option<State.State>
  (self: State.State, move: Move, pegCount: number): Option.Option<State.State>
} = dual(
  3,
  (self: State.State, move: Move, pegCount: number): Option.Option<State.State> =>
    isLegal(self, move, pegCount) ? Option.some(State.withDisk(self, move.disk, move.peg)) : Option.none()
)
