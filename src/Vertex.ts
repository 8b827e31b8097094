/**
 * Search bookkeeping for one discovered state.
 *
 * @since 0.1.0
 */
import * as Option from "effect/Option"
import type { Move } from "./Puzzle.js"
import type { State } from "./State.js"

// =============================================================================
// Models
// =============================================================================

/**
 * Breadth-first processing status.
 *
 * - `Unvisited`: not yet enqueued
 * - `Frontier`: enqueued, neighbors not yet expanded
 * - `Settled`: all neighbors expanded
 *
 * @since 0.1.0
 * @category models
 */
export type Color = "Unvisited" | "Frontier" | "Settled"

/**
 * A vertex of the implicit puzzle graph.
 *
 * `distance`, `predecessor` and `lastMove` are written once, when the vertex
 * leaves `Unvisited`. `predecessor` points back into the owning store and is
 * only meaningful while that store is alive.
 *
 * @since 0.1.0
 * @category models
 */
export interface Vertex {
  readonly state: State
  readonly index: number
  color: Color
  distance: number
  predecessor: Option.Option<Vertex>
  lastMove: Option.Option<Move>
}

// =============================================================================
// Constructors
// =============================================================================

/**
 * @since 0.1.0
 * @category constructors
 */
export const make = (state: State, index: number): Vertex => ({
  state,
  index,
  color: "Unvisited",
  distance: 0,
  predecessor: Option.none(),
  lastMove: Option.none()
})

// =============================================================================
// Transitions
// =============================================================================

/**
 * Marks the search root: frontier, distance 0, no predecessor.
 *
 * @since 0.1.0
 * @category transitions
 */
export const root = (self: Vertex): void => {
  self.color = "Frontier"
  self.distance = 0
  self.predecessor = Option.none()
  self.lastMove = Option.none()
}

/**
 * Records the first discovery of `self` from `from` through `move`.
 *
 * Returns `false` and leaves the vertex untouched when it was already
 * discovered.
 *
 * @since 0.1.0
 * @category transitions
 */
export const discover = (self: Vertex, from: Vertex, move: Move): boolean => {
  if (self.color !== "Unvisited") {
    return false
  }
  self.color = "Frontier"
  self.distance = from.distance + 1
  self.predecessor = Option.some(from)
  self.lastMove = Option.some(move)
  return true
}

/**
 * @since 0.1.0
 * @category transitions
 */
export const settle = (self: Vertex): void => {
  self.color = "Settled"
}

// =============================================================================
// Guards
// =============================================================================

/**
 * The search root is the only discovered vertex without a predecessor.
 *
 * @since 0.1.0
 * @category guards
 */
export const isRoot = (self: Vertex): boolean => self.color !== "Unvisited" && Option.isNone(self.predecessor)
