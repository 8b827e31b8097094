/**
 * Property-based tests for solver laws.
 *
 * These tests check properties every optimal solution must have:
 * - Replaying the reported moves turns the start arrangement into the target
 * - The number of moves equals the reported distance
 * - Distance is symmetric, since every legal move can be undone
 * - Perfect towers on three pegs take 2^D - 1 moves
 *
 * @since 0.1.0
 */

import { describe, it, expect } from "vitest"
import * as Arr from "effect/Array"
import * as Effect from "effect/Effect"
import * as FastCheck from "effect/FastCheck"
import * as Option from "effect/Option"
import * as MoveRule from "../../src/MoveRule.js"
import type { MoveLabel, Puzzle } from "../../src/Puzzle.js"
import * as Solver from "../../src/Solver.js"
import * as State from "../../src/State.js"

// pegs 0..2 are valid for every peg count drawn here, and with three or more
// pegs every arrangement is reachable from every other
const puzzleArbitrary: FastCheck.Arbitrary<Puzzle> = FastCheck.integer({ min: 1, max: 3 }).chain((diskCount) => {
  const arrangement = FastCheck.array(FastCheck.integer({ min: 0, max: 2 }), {
    minLength: diskCount,
    maxLength: diskCount
  })
  return FastCheck.record({
    diskCount: FastCheck.constant(diskCount),
    pegCount: FastCheck.integer({ min: 3, max: 4 }),
    start: arrangement,
    target: arrangement
  })
})

const replay = (puzzle: Puzzle, moves: ReadonlyArray<MoveLabel>): Option.Option<State.State> =>
  Arr.reduce(moves, Option.some(State.make(puzzle.start)), (state, label) =>
    Option.flatMap(state, MoveRule.apply({ disk: label.disk - 1, peg: label.peg - 1 }, puzzle.pegCount)))

const tower = (diskCount: number, peg: number): ReadonlyArray<number> => Array.from({ length: diskCount }, () => peg)

describe("Solver Laws", () => {
  describe("Replay", () => {
    it("moves lead from start to target", () =>
      FastCheck.assert(
        FastCheck.property(puzzleArbitrary, (puzzle) => {
          const solution = Effect.runSync(Solver.solvePuzzle(puzzle))
          const end = replay(puzzle, solution.moves)

          expect(solution.moves).toHaveLength(solution.distance)
          expect(Option.exists(end, (state) => State.equals(state, State.make(puzzle.target)))).toBe(true)
        }),
        { numRuns: 100 }
      ))
  })

  describe("Symmetry", () => {
    it("distance(a, b) = distance(b, a)", () =>
      FastCheck.assert(
        FastCheck.property(puzzleArbitrary, (puzzle) => {
          const forward = Effect.runSync(Solver.solvePuzzle(puzzle))
          const backward = Effect.runSync(
            Solver.solve(puzzle.diskCount, puzzle.pegCount, puzzle.target, puzzle.start)
          )

          expect(backward.distance).toBe(forward.distance)
        }),
        { numRuns: 50 }
      ))
  })

  describe("Identity", () => {
    it("solve(a, a) takes no moves", () =>
      FastCheck.assert(
        FastCheck.property(puzzleArbitrary, (puzzle) => {
          const solution = Effect.runSync(
            Solver.solve(puzzle.diskCount, puzzle.pegCount, puzzle.start, puzzle.start)
          )

          expect(solution.distance).toBe(0)
          expect(solution.moves).toEqual([])
        }),
        { numRuns: 50 }
      ))
  })

  describe("Closed forms", () => {
    it("perfect towers on three pegs take 2^D - 1 moves", () => {
      for (let diskCount = 1; diskCount <= 5; diskCount++) {
        const solution = Effect.runSync(
          Solver.solve(diskCount, 3, tower(diskCount, 0), tower(diskCount, 2))
        )
        expect(solution.distance).toBe(2 ** diskCount - 1)
      }
    })

    it("perfect towers on four pegs follow Frame-Stewart", () => {
      const expected = [1, 3, 5, 9]
      expected.forEach((moves, i) => {
        const diskCount = i + 1
        const solution = Effect.runSync(
          Solver.solve(diskCount, 4, tower(diskCount, 0), tower(diskCount, 3))
        )
        expect(solution.distance).toBe(moves)
      })
    })
  })
})
