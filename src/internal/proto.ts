/**
 * Shared Proto object utilities.
 *
 * Provides the Inspectable and Pipeable protocols for the library's mutable
 * containers, rendered from a small JSON summary instead of their contents.
 *
 * @since 0.1.0
 * @internal
 */

import { format, NodeInspectSymbol } from "effect/Inspectable"
import { pipeArguments } from "effect/Pipeable"
import * as Predicate from "effect/Predicate"

/**
 * Type guard for values carrying the given type identifier.
 *
 * @internal
 */
export const hasTypeId = <Id extends symbol>(u: unknown, typeId: Id): u is { readonly [K in Id]: Id } =>
  Predicate.hasProperty(u, typeId)

/**
 * Creates common Proto object methods.
 *
 * This factory provides consistent implementations of:
 * - toJSON (uses the given summary)
 * - NodeInspectSymbol (same summary)
 * - toString (uses format)
 * - pipe (uses pipeArguments)
 *
 * @internal
 */
export const makeProtoBase = <A>(typeId: symbol, summary: (self: A) => unknown) => ({
  [typeId]: typeId,
  toJSON(this: A) {
    return summary(this)
  },
  [NodeInspectSymbol](this: A) {
    return summary(this)
  },
  toString(this: A) {
    return format(summary(this))
  },
  pipe() {
    return pipeArguments(this, arguments)
  }
})
