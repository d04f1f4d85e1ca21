export const CLIErrors = {
	MISSING_SUBCOMMAND: "Missing subcommand. Usage: tapkit <parse|validate|merge> <inputs...>",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	PARSE_SINGLE_INPUT: "parse takes exactly one input",
	STDIN_TWICE: 'Standard input ("-") can only be read once',
	CONFIG_SYNTAX: (path: string) => `Invalid config file: parse error at ${path}`,
	CONFIG_SCHEMA: (path: string, issues: string) => `Invalid config file ${path}: ${issues}`,
	OUTPUT_WRITE: (path: string, reason: string) => `Cannot write output file ${path}: ${reason}`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Parse, validate and merge Test Anything Protocol documents",
	PARSE: "Parse a TAP document and write it back in canonical form",
	VALIDATE: "Check TAP documents against their plan",
	MERGE: "Merge TAP documents into one, renumbering test cases",
} as const;
