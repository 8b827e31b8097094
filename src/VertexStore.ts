/**
 * Deduplicating registry of vertices.
 *
 * The store owns every vertex created during one search. Vertices are created
 * lazily, the first time their state is resolved, and receive consecutive
 * indices in creation order. States are looked up by structural hash, so
 * `resolve` is expected O(1).
 *
 * @since 0.1.0
 */
import * as MutableHashMap from "effect/MutableHashMap"
import * as Option from "effect/Option"
import type { Pipeable } from "effect/Pipeable"
import type { Mutable } from "effect/Types"
import { hasTypeId, makeProtoBase } from "./internal/proto.js"
import type { State } from "./State.js"
import * as Vertex from "./Vertex.js"

// =============================================================================
// Symbols
// =============================================================================

/**
 * VertexStore type identifier.
 *
 * @since 0.1.0
 * @category symbols
 */
export const VertexStoreTypeId: unique symbol = Symbol.for("effect-hanoi/VertexStore")

/**
 * @since 0.1.0
 * @category symbols
 */
export type VertexStoreTypeId = typeof VertexStoreTypeId

// =============================================================================
// Models
// =============================================================================

/**
 * @since 0.1.0
 * @category models
 */
export interface VertexStore extends Pipeable {
  readonly [VertexStoreTypeId]: VertexStoreTypeId

  /**
   * Returns the vertex registered for an equal state, creating and
   * registering an `Unvisited` one on first reference.
   */
  readonly resolve: (state: State) => Vertex.Vertex

  /**
   * Looks a state up without creating a vertex.
   */
  readonly get: (state: State) => Option.Option<Vertex.Vertex>

  /**
   * Number of vertices created since the last reset.
   */
  readonly size: () => number

  /**
   * Vertices in creation order.
   */
  readonly vertices: () => ReadonlyArray<Vertex.Vertex>

  /**
   * Drops every vertex and restarts indices at 0.
   */
  readonly reset: () => void
}

// =============================================================================
// Guards
// =============================================================================

/**
 * @since 0.1.0
 * @category guards
 */
export const isVertexStore = (u: unknown): u is VertexStore => hasTypeId(u, VertexStoreTypeId)

// =============================================================================
// Proto Objects
// =============================================================================

/** @internal */
const ProtoVertexStore = makeProtoBase<VertexStore>(VertexStoreTypeId, (self) => ({
  _id: "VertexStore",
  size: self.size()
}))

// =============================================================================
// Constructors
// =============================================================================

/**
 * Creates an empty store.
 *
 * @example
 * ```ts
 * import * as State from "effect-hanoi/State"
 * import * as VertexStore from "effect-hanoi/VertexStore"
 *
 * const store = VertexStore.make()
 * const a = store.resolve(State.make([0, 0]))
 * const b = store.resolve(State.make([0, 0]))
 * console.log(a === b, a.index) // true 0
 * ```
 *
 * @since 0.1.0
 * @category constructors
 */
export const make = (): VertexStore => {
  const store: Mutable<VertexStore> = Object.create(ProtoVertexStore)
  let registry = MutableHashMap.empty<State, Vertex.Vertex>()
  let created: Array<Vertex.Vertex> = []

  store.resolve = (state) => {
    const existing = MutableHashMap.get(registry, state)
    if (Option.isSome(existing)) {
      return existing.value
    }
    const vertex = Vertex.make(state, created.length)
    MutableHashMap.set(registry, state, vertex)
    created.push(vertex)
    return vertex
  }

  store.get = (state) => MutableHashMap.get(registry, state)

  store.size = () => created.length

  store.vertices = () => created

  store.reset = () => {
    registry = MutableHashMap.empty()
    created = []
  }

  return store
}
