import { describe, it, expect } from "vitest"
import { pipe } from "effect/Function"
import * as Option from "effect/Option"
import * as MoveRule from "./MoveRule.js"
import * as State from "./State.js"

const listMoves = (pegs: ReadonlyArray<number>, pegCount: number) =>
  Array.from(MoveRule.legalMoves(State.make(pegs), pegCount), ({ move, state }) => ({
    move,
    state: Array.from(state)
  }))

describe("MoveRule", () => {
  describe("legalMoves", () => {
    it("should only move the top disk of a shared peg", () => {
      expect(listMoves([0, 0], 3)).toEqual([
        { move: { disk: 0, peg: 1 }, state: [1, 0] },
        { move: { disk: 0, peg: 2 }, state: [2, 0] }
      ])
    })

    it("should order by disk rank, then destination peg", () => {
      expect(listMoves([1, 0], 3)).toEqual([
        { move: { disk: 0, peg: 0 }, state: [0, 0] },
        { move: { disk: 0, peg: 2 }, state: [2, 0] },
        { move: { disk: 1, peg: 2 }, state: [1, 2] }
      ])
    })

    it("should never list a covered disk as movable", () => {
      const moves = listMoves([0, 0, 0], 4)

      expect(moves).toHaveLength(3)
      expect(moves.every(({ move }) => move.disk === 0)).toBe(true)
    })

    it("should not place a disk on a smaller one", () => {
      // disk 0 on peg 1, disk 1 on peg 2, disk 2 on peg 0
      const moves = listMoves([1, 2, 0], 3)

      expect(moves.map(({ move }) => move)).toEqual([
        { disk: 0, peg: 0 },
        { disk: 0, peg: 2 },
        { disk: 1, peg: 0 }
      ])
    })

    it("should produce nothing with a single peg", () => {
      expect(listMoves([0, 0], 1)).toEqual([])
    })

    it("should be lazy", () => {
      const iterator = MoveRule.legalMoves(State.make([0, 0, 0]), 3)
      const first = iterator.next()

      expect(first.done).toBe(false)
      expect(first.value).toEqual({ move: { disk: 0, peg: 1 }, state: State.make([1, 0, 0]) })
    })
  })

  describe("predicates", () => {
    it("should detect the topmost disk", () => {
      const state = State.make([1, 1, 0])

      expect(MoveRule.isTopmost(state, 0)).toBe(true)
      expect(MoveRule.isTopmost(state, 1)).toBe(false)
      expect(MoveRule.isTopmost(state, 2)).toBe(true)
    })

    it("should detect smaller disks on a peg", () => {
      const state = State.make([1, 1, 0])

      expect(MoveRule.pegHasSmallerDisk(state, 2, 1)).toBe(true)
      expect(MoveRule.pegHasSmallerDisk(state, 2, 2)).toBe(false)
      expect(MoveRule.pegHasSmallerDisk(state, 0, 1)).toBe(false)
    })
  })

  describe("apply", () => {
    const state = State.make([0, 0])

    it("should apply a legal move", () => {
      const result = MoveRule.apply(state, { disk: 0, peg: 1 }, 3)
      expect(Option.map(result, (next) => Array.from(next))).toEqual(Option.some([1, 0]))
    })

    it("should refuse a covered disk", () => {
      expect(Option.isNone(MoveRule.apply(state, { disk: 1, peg: 1 }, 3))).toBe(true)
    })

    it("should refuse a move onto the current peg", () => {
      expect(Option.isNone(MoveRule.apply(state, { disk: 0, peg: 0 }, 3))).toBe(true)
    })

    it("should refuse unknown disks and pegs", () => {
      expect(Option.isNone(MoveRule.apply(state, { disk: 2, peg: 1 }, 3))).toBe(true)
      expect(Option.isNone(MoveRule.apply(state, { disk: 0, peg: 3 }, 3))).toBe(true)
      expect(Option.isNone(MoveRule.apply(state, { disk: -1, peg: 1 }, 3))).toBe(true)
    })

    it("should support data-last application", () => {
      const result = pipe(state, MoveRule.apply({ disk: 0, peg: 2 }, 3))
      expect(Option.map(result, (next) => Array.from(next))).toEqual(Option.some([2, 0]))
    })
  })
})
