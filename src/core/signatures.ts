/**
 * Declaration-introducer patterns used to rescue structural lines
 * from collapsed added runs. Patterns match the line content without
 * its diff prefix.
 */

type Language =
	| "python"
	| "javascript"
	| "go"
	| "rust"
	| "jvm"
	| "ruby"
	| "php";

const LANGUAGE_PATTERNS: Record<Language, RegExp[]> = {
	python: [/^\s*(?:async\s+)?def\s+\w+/, /^\s*class\s+\w+/],
	javascript: [
		/^\s*(?:export\s+)?(?:default\s+)?(?:async\s+)?function\b/,
		/^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+\w+/,
		/^\s*(?:export\s+)?(?:interface|type|enum)\s+\w+/,
		/^\s*(?:export\s+)?const\s+\w+\s*=\s*(?:async\s+)?(?:\([^)]*\)|\w+)\s*=>/,
	],
	go: [/^func\s/, /^type\s+\w+\s+(?:struct|interface)\b/],
	rust: [
		/^\s*(?:pub(?:\([^)]*\))?\s+)?(?:async\s+)?fn\s+\w+/,
		/^\s*(?:pub(?:\([^)]*\))?\s+)?(?:struct|enum|trait)\s+\w+/,
		/^\s*impl\b/,
	],
	jvm: [
		/^\s*(?:(?:public|private|protected|internal|static|abstract|final|sealed|data|open)\s+)*(?:class|interface|enum|record|object)\s+\w+/,
		/^\s*(?:(?:public|private|protected|internal|static|abstract|final|override|suspend)\s+)*fun\s+\w+/,
		/^\s*(?:(?:public|private|protected|internal|static|abstract|final|override|async|virtual)\s+)+[\w<>[\],.?]+\s+\w+\s*\(/,
	],
	ruby: [/^\s*def\s+[\w.]+/, /^\s*(?:class|module)\s+\w+/],
	php: [
		/^\s*(?:(?:public|private|protected|static|abstract|final)\s+)*function\s+\w+/,
		/^\s*(?:(?:abstract|final)\s+)?(?:class|interface|trait)\s+\w+/,
	],
};

const EXTENSION_LANGUAGES: Record<string, Language> = {
	".py": "python",
	".js": "javascript",
	".jsx": "javascript",
	".mjs": "javascript",
	".cjs": "javascript",
	".ts": "javascript",
	".tsx": "javascript",
	".mts": "javascript",
	".cts": "javascript",
	".go": "go",
	".rs": "rust",
	".java": "jvm",
	".kt": "jvm",
	".kts": "jvm",
	".cs": "jvm",
	".scala": "jvm",
	".rb": "ruby",
	".php": "php",
};

function extensionOf(filename: string): string {
	const base = filename.slice(filename.lastIndexOf("/") + 1);
	const dot = base.lastIndexOf(".");
	return dot > 0 ? base.slice(dot).toLowerCase() : "";
}

/**
 * Declaration patterns for a file, based on its extension.
 * Returns an empty list for files without significant top-level declarations.
 */
export function signaturePatternsFor(filename: string): RegExp[] {
	const language = EXTENSION_LANGUAGES[extensionOf(filename)];
	return language ? LANGUAGE_PATTERNS[language] : [];
}

/**
 * Check if a diff line (including its prefix) introduces a declaration.
 */
export function isSignatureLine(line: string, patterns: RegExp[]): boolean {
	const content = line.slice(1);
	return patterns.some((p) => p.test(content));
}
