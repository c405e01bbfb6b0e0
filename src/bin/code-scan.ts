#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process
// FORMAT THEOREM: ∀run: main returns exitCode ∈ {0,1} → process.exit(exitCode) occurs exactly once
// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) time/space (delegates to APP)

import { Effect } from "effect";

import { main } from "../main.js";

/**
 * CLI entry point for code-scan.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once with ExitCode ∈ {0,1}
 */
void Effect.runPromise(main()).then(
	(code) => process.exit(code),
	(error) => {
		console.error("Fatal error:", error);
		process.exit(1);
	},
);
