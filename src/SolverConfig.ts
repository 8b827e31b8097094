/**
 * Solver configuration.
 *
 * @since 0.1.0
 */
import * as Config from "effect/Config"
import type * as ConfigError from "effect/ConfigError"
import * as Context from "effect/Context"
import * as Effect from "effect/Effect"
import * as Layer from "effect/Layer"
import * as Option from "effect/Option"

/**
 * @since 0.1.0
 * @category models
 */
export interface Settings {
  /**
   * Vertex budget for a single search; unbounded when none.
   */
  readonly maxVertices: Option.Option<number>
}

/**
 * Settings read from the environment:
 *
 * - `HANOI_MAX_VERTICES`: optional positive integer
 *
 * @since 0.1.0
 * @category config
 */
export const settings: Config.Config<Settings> = Config.all({
  maxVertices: Config.option(
    Config.integer("HANOI_MAX_VERTICES").pipe(
      Config.validate({
        message: "Expected a positive integer",
        validation: (n) => n > 0
      })
    )
  )
})

/**
 * Solver configuration service tag.
 *
 * The solver reads this service optionally; without it searches are
 * unbounded.
 *
 * @example
 * ```ts
 * import * as Effect from "effect/Effect"
 * import * as Option from "effect/Option"
 * import * as Solver from "effect-hanoi/Solver"
 * import { SolverConfig } from "effect-hanoi/SolverConfig"
 *
 * const program = Solver.solve(3, 3, [0, 0, 0], [2, 2, 2]).pipe(
 *   Effect.provide(SolverConfig.make({ maxVertices: Option.some(1000) }))
 * )
 * ```
 *
 * @since 0.1.0
 * @category tags
 */
export class SolverConfig extends Context.Tag("effect-hanoi/SolverConfig")<SolverConfig, Settings>() {
  /**
   * No vertex budget.
   *
   * @since 0.1.0
   */
  static Default: Layer.Layer<SolverConfig> = Layer.succeed(this, { maxVertices: Option.none() })

  /**
   * Reads settings from the current `ConfigProvider`.
   *
   * @since 0.1.0
   */
  static FromEnv: Layer.Layer<SolverConfig, ConfigError.ConfigError> = Layer.effect(this, settings)

  /**
   * @since 0.1.0
   */
  static make = (value: Settings): Layer.Layer<SolverConfig> => Layer.succeed(this, value)
}

/**
 * Current vertex budget, if any.
 *
 * @since 0.1.0
 * @category accessors
 */
export const maxVertices: Effect.Effect<Option.Option<number>> = Effect.serviceOption(SolverConfig).pipe(
  Effect.map((config) => Option.flatMap(config, (settings) => settings.maxVertices))
)
