// CHANGE: Security rules (injection, secrets, weak crypto, unsafe loading)
// PURITY: CORE
// INVARIANT: Every rule carries a CWE id
// COMPLEXITY: O(|line|) per rule evaluation

import { pattern } from "../../types/index.js";
import type { Rule } from "../../types/index.js";

export const securityRules: readonly Rule[] = [
	{
		id: "sec-sql-injection",
		title: "SQL injection",
		category: "security",
		severity: "critical",
		matcher: pattern(
			/\b(?:execute|executemany)\s*\(\s*(?:f["']|["'][^"']*["']\s*(?:%|\+|\.format\())|["'](?:SELECT|INSERT|UPDATE|DELETE)\b[^"']*["']\s*(?:%|\+)|f["'](?:SELECT|INSERT|UPDATE|DELETE)\b[^"']*\{/iu,
		),
		cweId: "CWE-89",
		descriptionTemplate:
			"SQL statement built with string formatting or concatenation",
		fixTemplate: null,
		explanation:
			"Values spliced into SQL text can change the statement. Pass them as query parameters so the driver escapes them.",
	},
	{
		id: "sec-command-injection",
		title: "Command injection",
		category: "security",
		severity: "critical",
		matcher: pattern(
			/\bos\.(?:system|popen)\s*\(|\bsubprocess\.\w+\s*\(.*\bshell\s*=\s*True/u,
		),
		cweId: "CWE-78",
		descriptionTemplate: "Command executed through a system shell",
		fixTemplate: null,
		explanation:
			"A shell interprets metacharacters in its input. Run the program with an argument list and shell=False.",
	},
	{
		id: "sec-hardcoded-credential",
		title: "Hardcoded credential",
		category: "security",
		severity: "critical",
		matcher: pattern(
			/\b(\w*?(?:password|passwd|pwd|secret|token|api_key|apikey)\w*)["']?\s*(?::\s*[\w.[\], ]+?\s*)?[:=]\s*(["'])([^"']+)\2/iu,
		),
		cweId: "CWE-798",
		descriptionTemplate: "Hardcoded credential assigned to '{1}'",
		fixTemplate: '{1} = os.environ["{1|upper}"]',
		explanation:
			"Secrets in source end up in version control and build artifacts. Read them from the environment or a secret store.",
	},
	{
		id: "sec-weak-hash",
		title: "Weak hash algorithm",
		category: "security",
		severity: "warning",
		matcher: pattern(/\b(?:hashlib\.)?(md5|sha1)\s*\(/iu),
		cweId: "CWE-327",
		descriptionTemplate: "Weak hash algorithm {1|lower}",
		fixTemplate: "hashlib.sha256(...)",
		explanation:
			"MD5 and SHA-1 have practical collision attacks. Use SHA-256 or a dedicated password hash.",
	},
	{
		id: "sec-dynamic-eval",
		title: "Dynamic code execution",
		category: "security",
		severity: "critical",
		matcher: pattern(/(?<![.\w])(eval|exec)\s*\(/u),
		cweId: "CWE-95",
		descriptionTemplate: "Dynamic code execution with {1}()",
		fixTemplate: "ast.literal_eval(...)",
		explanation:
			"Evaluating text as code runs whatever an attacker can place in it. Parse the data explicitly.",
	},
	{
		id: "sec-unsafe-deserialization",
		title: "Unsafe deserialization",
		category: "security",
		severity: "warning",
		matcher: pattern(/\b(pickle|cPickle|marshal|dill)\.loads?\s*\(/u),
		cweId: "CWE-502",
		descriptionTemplate: "Deserializing data with {1}",
		fixTemplate: "json.loads(...)",
		explanation:
			"Loading a pickle can execute arbitrary code. Use a data-only format for anything that crosses a trust boundary.",
	},
	{
		id: "sec-yaml-load",
		title: "Unsafe YAML load",
		category: "security",
		severity: "error",
		matcher: pattern(/\byaml\.load\s*\((?!.*Loader\s*=\s*(?:yaml\.)?SafeLoader)/u),
		cweId: "CWE-502",
		descriptionTemplate: "yaml.load without SafeLoader",
		fixTemplate: "yaml.safe_load(...)",
		explanation:
			"The default YAML loader can construct arbitrary objects from tagged input.",
	},
	{
		id: "sec-tls-verify-disabled",
		title: "TLS verification disabled",
		category: "security",
		severity: "error",
		matcher: pattern(/\bverify\s*=\s*False\b/u),
		cweId: "CWE-295",
		descriptionTemplate: "TLS certificate verification disabled",
		fixTemplate: "verify=True",
		explanation:
			"Without certificate checks any host on the path can impersonate the server.",
	},
];
