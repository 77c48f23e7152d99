// @ts-check
import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import { defineConfig } from "eslint/config";
import vitest from "eslint-plugin-vitest";
import globals from "globals";
import tseslint from "typescript-eslint";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],

			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{
					allowNumber: true,
					allowBoolean: true,
					allowNullish: false,
					allowAny: false,
					allowRegExp: false,
				},
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"@eslint-community/eslint-comments/no-use": "error",
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"no-restricted-syntax": [
				"error",
				{
					selector: "TSUnknownKeyword",
					message: "'unknown' is not allowed. Narrow the type at its source.",
				},
				{
					selector: "SwitchStatement",
					message: [
						"Switch statements are not allowed.",
						"Use ts-pattern match() instead:",
						"  const result = match(item)",
						"    .with({ type: 'this' }, (it) => processThis(it))",
						"    .with({ type: 'that' }, (it) => processThat(it))",
						"    .exhaustive();",
					].join("\n"),
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Avoid using require(). Use ES imports instead.",
				},
				{
					selector: "ThrowStatement > Literal:not([value=/^\\w+Error:/])",
					message:
						'Do not throw string literals or non-Error objects. Throw new Error("...") instead.',
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "async/await is not allowed. Use Effect.gen / Effect.tryPromise.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "new Promise is not allowed. Use Effect.async / Effect.tryPromise.",
				},
				{
					selector: "CallExpression[callee.object.name='Promise']",
					message: "Promise.* is not allowed. Use Effect combinators (all, forEach, ...).",
				},
			],
			"@typescript-eslint/no-restricted-types": [
				"error",
				{
					types: {
						unknown: {
							message: "'unknown' is not allowed. Narrow the type at its source.",
						},
						Promise: {
							message: "Promise is not allowed. Use Effect.Effect<A, E, R>.",
							suggest: ["Effect.Effect"],
						},
						"Promise<*>": {
							message: "Promise<T> is not allowed. Use Effect.Effect<T, E, R>.",
							suggest: ["Effect.Effect<T, E, R>"],
						},
					},
				},
			],
			"@typescript-eslint/use-unknown-in-catch-callback-variable": "off",
			"no-throw-literal": "off",
			"@typescript-eslint/only-throw-error": [
				"error",
				{ allowThrowingUnknown: false, allowThrowingAny: false },
			],
		},
	},
	{
		files: ["**/*.{test,spec}.ts"],
		...vitest.configs.all,
		languageOptions: {
			globals: {
				...vitest.environments.env.globals,
			},
		},
		rules: {
			"@eslint-community/eslint-comments/no-use": "off",
			"max-lines-per-function": "off",
		},
	},
	{ ignores: ["dist/**", "coverage/**", "eslint.config.mts"] },
);
