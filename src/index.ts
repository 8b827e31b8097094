/**
 * @since 0.1.0
 */

/**
 * @since 0.1.0
 */
export * as Adjacency from "./Adjacency.js"

/**
 * @since 0.1.0
 */
export * as HanoiError from "./HanoiError.js"

/**
 * @since 0.1.0
 */
export * as MoveRule from "./MoveRule.js"

/**
 * @since 0.1.0
 */
export * as PathReconstructor from "./PathReconstructor.js"

/**
 * @since 0.1.0
 */
export * as Puzzle from "./Puzzle.js"

/**
 * @since 0.1.0
 */
export * as PuzzleInput from "./PuzzleInput.js"

/**
 * @since 0.1.0
 */
export * as SearchEngine from "./SearchEngine.js"

/**
 * @since 0.1.0
 */
export * as Solver from "./Solver.js"

/**
 * @since 0.1.0
 */
export * as SolverConfig from "./SolverConfig.js"

/**
 * @since 0.1.0
 */
export * as State from "./State.js"

/**
 * @since 0.1.0
 */
export * as Vertex from "./Vertex.js"

/**
 * @since 0.1.0
 */
export * as VertexStore from "./VertexStore.js"
