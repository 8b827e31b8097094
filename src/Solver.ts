/**
 * Minimum-move solver for the generalized Tower of Hanoi.
 *
 * Validates the puzzle, searches the implicit state graph breadth-first and
 * reports the optimal move sequence in 1-based puzzle notation.
 *
 * @since 0.1.0
 */
import * as Arr from "effect/Array"
import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import type { SolveError } from "./HanoiError.js"
import * as PathReconstructor from "./PathReconstructor.js"
import * as Puzzle from "./Puzzle.js"
import * as SearchEngine from "./SearchEngine.js"
import * as SolverConfig from "./SolverConfig.js"
import * as State from "./State.js"
import * as VertexStore from "./VertexStore.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface Solution {
  /**
   * Minimum number of moves.
   */
  readonly distance: number
  /**
   * Optimal moves in execution order, 1-based.
   */
  readonly moves: ReadonlyArray<Puzzle.MoveLabel>
  /**
   * Vertices the search created before reaching the target.
   */
  readonly explored: number
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Solves a puzzle given as 0-based peg ids indexed by disk rank.
 *
 * Input is validated before the search starts. Honors the vertex budget of
 * the `SolverConfig` service when one is provided.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as Solver from "effect-hanoi/Solver"
 *
 * const program = Solver.solve(3, 3, [0, 0, 0], [2, 2, 2])
 *
 * Effect.runPromise(program).then(({ distance, moves }) => {
 *   console.log(distance) // 7
 *   console.log(moves[0]) // { disk: 1, peg: 3 }
 * })
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const solve = (
  diskCount: number,
  pegCount: number,
  start: ReadonlyArray<number>,
  target: ReadonlyArray<number>
): Effect.Effect<Solution, SolveError> =>
  Effect.gen(function* () {
    const dimensions = yield* Puzzle.decodeDimensions({ diskCount, pegCount })
    const from = yield* State.validate(dimensions, start, "start")
    const to = yield* State.validate(dimensions, target, "target")
    const maxVertices = yield* SolverConfig.maxVertices

    const store = VertexStore.make()
    const result = yield* SearchEngine.shortestPath(store, dimensions.pegCount, from, to, {
      maxVertices: Option.getOrUndefined(maxVertices)
    })
    const moves = yield* PathReconstructor.reconstruct(result.target)

    yield* Effect.logDebug("Solved").pipe(
      Effect.annotateLogs({ distance: result.distance, explored: result.explored })
    )

    return {
      distance: result.distance,
      moves: Arr.map(moves, Puzzle.toLabel),
      explored: result.explored
    }
  }).pipe(
    Effect.annotateLogs({ diskCount, pegCount }),
    Effect.withLogSpan("solve")
  )

/**
 * Solves a parsed puzzle.
 *
 * @since 0.1.0
 * @category operations
 */
export const solvePuzzle = (puzzle: Puzzle.Puzzle): Effect.Effect<Solution, SolveError> =>
  solve(puzzle.diskCount, puzzle.pegCount, puzzle.start, puzzle.target)
