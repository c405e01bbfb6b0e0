// CHANGE: Barrel for CLI parsing and configuration loading
// PURITY: SHELL

export { parseCLIArgs, USAGE } from "./cli.js";
export {
	CONFIG_FILE_NAME,
	loadAnalyzerConfig,
	parseAnalyzerConfig,
} from "./loader.js";
