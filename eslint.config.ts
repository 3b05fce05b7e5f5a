import eslint from "@eslint/js";
import tseslint from "typescript-eslint";
import type { Rule } from "eslint";
import type { ConfigArray } from "typescript-eslint";

// Custom rule: enforce test file naming convention
const testFileNamingRule: Rule.RuleModule = {
	meta: {
		type: "problem",
		docs: {
			description:
				"Enforce that test files end with .unit.test.ts or .integration.test.ts",
			recommended: true,
		},
		messages: {
			invalidTestFileName:
				"Test file must end with .unit.test.ts or .integration.test.ts. Found: '{{actual}}'",
		},
	},
	create(context) {
		const filename = context.filename;

		return {
			Program() {
				if (!/\.test\.ts$|\.spec\.ts$/.test(filename)) {
					return;
				}

				const validSuffixes = [".unit.test.ts", ".integration.test.ts"];
				if (validSuffixes.some((suffix) => filename.endsWith(suffix))) {
					return;
				}

				context.report({
					loc: { column: 0, line: 1 },
					messageId: "invalidTestFileName",
					data: { actual: filename },
				});
			},
		};
	},
};

export default [
	// Global ignores
	{
		ignores: [
			"dist/**",
			"node_modules/**",
			"coverage/**",
			"*.config.ts", // Ignore config file to avoid parsing issues
		],
	},

	// Test file naming convention - enforce .unit.test.ts or .integration.test.ts
	{
		files: ["**/*.test.ts", "**/*.spec.ts"],
		plugins: {
			codegen: { rules: { "test-file-naming": testFileNamingRule } },
		},
		rules: {
			"codegen/test-file-naming": "error",
		},
	},

	// Base ESLint recommended rules
	{
		...eslint.configs.recommended,
		files: ["**/*.ts"],
	},

	// TypeScript (strict type-aware) - only for src/**/*.ts files
	...tseslint.configs.strictTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	...tseslint.configs.stylisticTypeChecked.map((config) => ({
		...config,
		files: ["src/**/*.ts"],
	})),
	{
		files: ["src/**/*.ts"],
		linterOptions: {
			noInlineConfig: true,
		},
		languageOptions: {
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		rules: {
			"@typescript-eslint/no-unused-vars": "error",
			"@typescript-eslint/no-explicit-any": "error",
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{ allowNumber: true },
			],
			"@typescript-eslint/restrict-plus-operands": [
				"error",
				{ allowNumberAndString: true },
			],
			// Forbid all type assertions (use proper type guards instead)
			"@typescript-eslint/no-non-null-assertion": "error",
			"@typescript-eslint/non-nullable-type-assertion-style": "off",
			"@typescript-eslint/consistent-type-assertions": ["error", { assertionStyle: "never" }],
			indent: ["error", "tab", { SwitchCase: 0 }],
			quotes: ["error", "double", { avoidEscape: true }],
			"max-lines": ["warn", { max: 300, skipBlankLines: true, skipComments: true }],
			"max-lines-per-function": ["warn", { max: 50, skipBlankLines: true, skipComments: true }],
			complexity: ["warn", { max: 10 }],
			"max-depth": ["warn", { max: 4 }],
			"max-params": ["warn", { max: 4 }],
			"max-nested-callbacks": ["warn", { max: 3 }],
		},
	},

	// Emitters build their output line by line; long functions are expected there
	{
		files: [
			"src/synth/rust.ts",
			"src/synth/typescript.ts",
			"src/validator.ts",
		],
		rules: {
			"max-lines": "off",
			"max-lines-per-function": "off",
			complexity: "off",
		},
	},

	// TypeScript (basic rules without type checking) - for tests
	...tseslint.configs.recommended.map((config) => ({
		...config,
		files: ["test/**/*.ts"],
	})),
	{
		files: ["test/**/*.ts"],
		rules: {
			"@typescript-eslint/no-unused-vars": "error",
			"@typescript-eslint/ban-ts-comment": ["error", {
				"ts-check": false,
				"ts-expect-error": true,
				"ts-ignore": true,
				"ts-nocheck": true,
			}],
			indent: ["error", "tab", { SwitchCase: 0 }],
			quotes: ["error", "double", { avoidEscape: true }],
		},
	},
] satisfies ConfigArray;
