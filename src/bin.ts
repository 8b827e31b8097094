#!/usr/bin/env node
/**
 * Command line entry point.
 *
 * Reads a puzzle from the file named by the first argument, or from standard
 * input, and prints the optimal solution.
 *
 * Environment:
 * - `HANOI_MAX_VERTICES`: vertex budget per search
 * - `HANOI_LOG_LEVEL`: minimum log level (default `Info`)
 *
 * @since 0.1.0
 */
import * as NodeContext from "@effect/platform-node/NodeContext"
import * as NodeRuntime from "@effect/platform-node/NodeRuntime"
import * as FileSystem from "@effect/platform/FileSystem"
import * as Config from "effect/Config"
import * as Console from "effect/Console"
import * as Effect from "effect/Effect"
import * as Logger from "effect/Logger"
import * as LogLevel from "effect/LogLevel"
import * as PuzzleInput from "./PuzzleInput.js"
import * as Solver from "./Solver.js"
import { SolverConfig } from "./SolverConfig.js"

const program = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem
  const source = process.argv[2] ?? "/dev/stdin"

  const text = yield* fs.readFileString(source)
  const puzzle = yield* PuzzleInput.parse(text)
  yield* Effect.logDebug("Parsed puzzle").pipe(Effect.annotateLogs({ source }))

  const solution = yield* Solver.solvePuzzle(puzzle)
  yield* Console.log(PuzzleInput.format(solution))
})

const logLevel = Config.logLevel("HANOI_LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))

const runnable = Effect.flatMap(logLevel, (level) => program.pipe(Logger.withMinimumLogLevel(level))).pipe(
  Effect.provide(SolverConfig.FromEnv),
  Effect.provide(NodeContext.layer)
)

NodeRuntime.runMain(runnable)
