/**
 * Recovers the move list from predecessor links.
 *
 * @since 0.1.0
 */
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import { BrokenChain } from "./HanoiError.js"
import type { Move } from "./Puzzle.js"
import type { Vertex } from "./Vertex.js"

/**
 * Walks back from `target` to the search root and returns the moves in
 * execution order. The result always has `target.distance` entries.
 *
 * @since 0.1.0
 * @category operations
 */
export const reconstruct = (target: Vertex): Effect.Effect<ReadonlyArray<Move>, BrokenChain> =>
  Effect.suspend((): Effect.Effect<ReadonlyArray<Move>, BrokenChain> => {
    const broken = (vertex: Vertex, step: number, reason: string) =>
      Effect.fail(
        new BrokenChain({
          vertex: vertex.index,
          step,
          distance: target.distance,
          message: `Vertex ${vertex.index} ${reason} at step ${step} of ${target.distance}`
        })
      )

    const moves: Array<Move> = []
    let cursor = target
    for (let step = 0; step < target.distance; step++) {
      if (Option.isNone(cursor.lastMove)) {
        return broken(cursor, step, "has no recorded move")
      }
      if (Option.isNone(cursor.predecessor)) {
        return broken(cursor, step, "has no predecessor")
      }
      moves.push(cursor.lastMove.value)
      cursor = cursor.predecessor.value
    }
    if (Option.isSome(cursor.predecessor)) {
      return broken(cursor, target.distance, "still has a predecessor")
    }

    return Effect.succeed(moves.reverse())
  })
