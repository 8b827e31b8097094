/**
 * Explicit adjacency export for a searched graph.
 *
 * Edges are not kept during search. This module rebuilds them from
 * `MoveRule` for the vertices a store holds, keyed by vertex index.
 *
 * @since 0.1.0
 */
import * as Arr from "effect/Array"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"
import * as Order from "effect/Order"
import * as MoveRule from "./MoveRule.js"
import type { VertexStore } from "./VertexStore.js"

/**
 * @since 0.1.0
 * @category models
 */
export type Adjacency = ReadonlyMap<number, ReadonlyArray<number>>

/**
 * Maps every vertex index in `store` to the sorted indices of its neighbors
 * that are also in `store`. Neighbors the search never materialized are left
 * out.
 *
 * @since 0.1.0
 * @category constructors
 */
export const fromStore = (store: VertexStore, pegCount: number): Adjacency =>
  new Map(
    Arr.map(store.vertices(), (vertex) =>
      [
        vertex.index,
        pipe(
          Arr.fromIterable(MoveRule.legalMoves(vertex.state, pegCount)),
          Arr.filterMap((transition) => Option.map(store.get(transition.state), (neighbor) => neighbor.index)),
          Arr.sort(Order.number)
        )
      ] as const
    )
  )

/**
 * Number of undirected edges in an adjacency map.
 *
 * @since 0.1.0
 * @category getters
 */
export const edgeCount = (self: Adjacency): number =>
  Arr.reduce(Arr.fromIterable(self.values()), 0, (total, neighbors) => total + neighbors.length) / 2
