// CHANGE: Static default catalog in category order
// PURITY: CORE
// INVARIANT: Order here is the insertion order used as the final sort key

import type { Rule } from "../../types/index.js";
import { complexityRules } from "./complexity.js";
import { deadCodeRules } from "./dead-code.js";
import { performanceRules } from "./performance.js";
import { qualityRules } from "./quality.js";
import { securityRules } from "./security.js";
import { syntaxRules } from "./syntax.js";
import { typeHintRules } from "./type-hints.js";

export const DEFAULT_CATALOG: readonly Rule[] = [
	...syntaxRules,
	...securityRules,
	...performanceRules,
	...qualityRules,
	...complexityRules,
	...deadCodeRules,
	...typeHintRules,
];
