/**
 * Example: Solving puzzles with three and four pegs.
 *
 * This example demonstrates the solver, its failure modes and the vertex
 * budget.
 *
 * @since 0.1.0
 */

import * as Effect from "effect/Effect"
import * as Option from "effect/Option"
import * as PuzzleInput from "../src/PuzzleInput.js"
import * as Solver from "../src/Solver.js"
import { SolverConfig } from "../src/SolverConfig.js"

// Example 1: The classic puzzle
const classic = Effect.gen(function* () {
  console.log("=== Classic Puzzle (3 disks, 3 pegs) ===")

  const solution = yield* Solver.solve(3, 3, [0, 0, 0], [2, 2, 2])
  console.log(PuzzleInput.format(solution))
})

// Example 2: A fourth peg shortens the solution
const fourPegs = Effect.gen(function* () {
  console.log("\n=== Four Pegs (4 disks) ===")

  const solution = yield* Solver.solve(4, 4, [0, 0, 0, 0], [3, 3, 3, 3])
  console.log("Moves:", solution.distance) // 9
  console.log("States explored:", solution.explored)
})

// Example 3: Parsing the text format
const fromText = Effect.gen(function* () {
  console.log("\n=== From Text ===")

  const puzzle = yield* PuzzleInput.parse("3 3\n2 1 1\n3 3 2\n")
  const solution = yield* Solver.solvePuzzle(puzzle)
  console.log(PuzzleInput.format(solution))
})

// Example 4: Failures are values
const failures = Effect.gen(function* () {
  console.log("\n=== Failures ===")

  const unreachable = yield* Solver.solve(2, 2, [0, 0], [1, 1]).pipe(Effect.flip)
  console.log(unreachable._tag, "-", unreachable.message)

  const invalid = yield* Solver.solve(2, 3, [0, 0], [0, 5]).pipe(Effect.flip)
  console.log(invalid._tag, "-", invalid.message)

  const limited = yield* Solver.solve(5, 3, [0, 0, 0, 0, 0], [2, 2, 2, 2, 2]).pipe(
    Effect.provide(SolverConfig.make({ maxVertices: Option.some(50) })),
    Effect.flip
  )
  console.log(limited._tag, "-", limited.message)
})

// Run all examples
const program = Effect.gen(function* () {
  yield* classic
  yield* fourPegs
  yield* fromText
  yield* failures
})

Effect.runPromise(program).catch(console.error)
