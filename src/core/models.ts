// CHANGE: Functional Core decision models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the analyzer process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/**
 * Minimal decision state for producing an exit code from reports.
 *
 * @remarks
 * - @pure true
 * - @precondition flags are computed from reports deterministically
 * - @invariant state is immutable
 * - @complexity O(1)
 */
export interface DecisionState {
	readonly invalidInput: boolean;
	readonly hasBlockingIssues: boolean;
}
