/**
 * Breadth-first search over the implicit puzzle graph.
 *
 * The graph is never built up front: vertices come from the store the first
 * time a state is referenced and edges come from `MoveRule` as each vertex is
 * expanded. Distances are fixed at first discovery, which on an unweighted
 * graph makes them shortest.
 *
 * @since 0.1.0
 */
import * as Effect from "effect/Effect"
import { NoPath, SearchLimitExceeded } from "./HanoiError.js"
import * as MoveRule from "./MoveRule.js"
import * as State from "./State.js"
import * as Vertex from "./Vertex.js"
import type { VertexStore } from "./VertexStore.js"

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface SearchOptions {
  /**
   * Upper bound on the number of vertices the search may create.
   */
  readonly maxVertices?: number | undefined
}

/**
 * @since 0.1.0
 * @category models
 */
export interface SearchResult {
  readonly distance: number
  readonly target: Vertex.Vertex
  /**
   * Vertices created by the search, including unexpanded frontier vertices.
   */
  readonly explored: number
}

// =============================================================================
// Operations
// =============================================================================

const search = (
  store: VertexStore,
  pegCount: number,
  start: State.State,
  target: State.State,
  maxVertices: number
): Effect.Effect<SearchResult, NoPath | SearchLimitExceeded> => {
  const exceeded = () =>
    Effect.fail(
      new SearchLimitExceeded({
        limit: maxVertices,
        message: `Search created more than ${maxVertices} vertices`
      })
    )

  store.reset()
  const root = store.resolve(start)
  if (store.size() > maxVertices) {
    return exceeded()
  }
  Vertex.root(root)

  const queue: Array<Vertex.Vertex> = [root]
  let head = 0

  while (head < queue.length) {
    const current = queue[head++]

    for (const transition of MoveRule.legalMoves(current.state, pegCount)) {
      const next = store.resolve(transition.state)
      if (store.size() > maxVertices) {
        return exceeded()
      }
      if (Vertex.discover(next, current, transition.move)) {
        queue.push(next)
      }
    }

    Vertex.settle(current)
    if (State.equals(current.state, target)) {
      return Effect.succeed({ distance: current.distance, target: current, explored: store.size() })
    }
  }

  return Effect.fail(
    new NoPath({
      explored: store.size(),
      message: `Target is unreachable; exhausted ${store.size()} reachable states`
    })
  )
}

/**
 * Finds the minimum number of moves from `start` to `target`.
 *
 * The store is reset first and afterwards holds every vertex the search
 * discovered, with predecessor links ready for reconstruction.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as SearchEngine from "effect-hanoi/SearchEngine"
 * import * as State from "effect-hanoi/State"
 * import * as VertexStore from "effect-hanoi/VertexStore"
 *
 * const program = SearchEngine.shortestPath(
 *   VertexStore.make(),
 *   3,
 *   State.uniform(3, 0),
 *   State.uniform(3, 2)
 * )
 *
 * Effect.runPromise(program).then((result) => console.log(result.distance)) // 7
 * ```
 *
 * @since 0.1.0
 * @category operations
 */
export const shortestPath = (
  store: VertexStore,
  pegCount: number,
  start: State.State,
  target: State.State,
  options: SearchOptions = {}
): Effect.Effect<SearchResult, NoPath | SearchLimitExceeded> =>
  Effect.suspend(() => search(store, pegCount, start, target, options.maxVertices ?? Infinity)).pipe(
    Effect.tap((result) =>
      Effect.logDebug("Reached target").pipe(
        Effect.annotateLogs({ distance: result.distance, explored: result.explored })
      )
    ),
    Effect.tapError((error) => Effect.logDebug(error.message)),
    Effect.withLogSpan("shortestPath")
  )
