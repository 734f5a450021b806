// eslint.config.mts
// @ts-check
import eslint from '@eslint/js';
import { defineConfig } from 'eslint/config';
import tseslint from 'typescript-eslint';
import globals from "globals";

export default defineConfig(
  eslint.configs.recommended,
  tseslint.configs.strictTypeChecked,
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

		"@typescript-eslint/restrict-template-expressions": ["error", {
			allowNumber: true,
			allowBoolean: true,
			allowNullish: false,
			allowAny: false,
			allowRegExp: false
		}],
		"@typescript-eslint/ban-ts-comment": [
			"error",
			{
				"ts-ignore": true,
				"ts-nocheck": true,
				"ts-expect-error": true,
				"ts-check": true,
			},
		],
		"no-restricted-syntax": [
				"error",
				{
					selector: "SwitchStatement",
					message: [
						"Switch statements are forbidden in functional programming paradigm.",
						"How to fix: Use ts-pattern match() instead.",
					].join("\n"),
				},
				{
					selector: 'CallExpression[callee.name="require"]',
					message: "Avoid using require(). Use ES6 imports instead.",
				},
				{
					selector: "ThrowStatement > Literal:not([value=/^\\w+Error:/])",
					message:
						'Do not throw string literals or non-Error objects. Throw new Error("...") instead.',
				},
		],
		"no-throw-literal": "off",
		"@typescript-eslint/only-throw-error": [
			"error",
			{ allowThrowingUnknown: false, allowThrowingAny: false },
		],
	}
  },
  {
    files: ['**/*.{test,spec}.ts', 'test/**'],
    rules: {
      'max-lines-per-function': 'off',
    },
  },

  { ignores: ['dist/**', 'coverage/**', 'eslint.config.mts'] },
);
