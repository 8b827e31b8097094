import { describe, it, expect } from "vitest"
import * as Option from "effect/Option"
import * as State from "./State.js"
import * as Vertex from "./Vertex.js"

describe("Vertex", () => {
  it("should record the first discovery only", () => {
    const root = Vertex.make(State.make([0, 0]), 0)
    const other = Vertex.make(State.make([2, 0]), 1)
    const next = Vertex.make(State.make([1, 0]), 2)
    Vertex.root(root)
    other.color = "Frontier"
    other.distance = 4

    expect(Vertex.discover(next, root, { disk: 0, peg: 1 })).toBe(true)
    expect(Vertex.discover(next, other, { disk: 0, peg: 1 })).toBe(false)

    expect(next.color).toBe("Frontier")
    expect(next.distance).toBe(1)
    expect(next.predecessor).toEqual(Option.some(root))
    expect(next.lastMove).toEqual(Option.some({ disk: 0, peg: 1 }))
  })

  it("should identify the search root", () => {
    const root = Vertex.make(State.make([0]), 0)
    const child = Vertex.make(State.make([1]), 1)

    expect(Vertex.isRoot(root)).toBe(false)
    Vertex.root(root)
    Vertex.discover(child, root, { disk: 0, peg: 1 })

    expect(Vertex.isRoot(root)).toBe(true)
    expect(Vertex.isRoot(child)).toBe(false)
  })

  it("should settle", () => {
    const vertex = Vertex.make(State.make([0]), 0)
    Vertex.root(vertex)
    Vertex.settle(vertex)

    expect(vertex.color).toBe("Settled")
  })
})
