import { TemplateError } from "./errors.js";
import { isRecord } from "./yaml.js";

const EXPRESSION_PATTERN = /\{\{\s*(.*?)\s*\}\}/g;
const PATH_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)*$/;

export function isVariablePath(value: string): boolean {
	return PATH_PATTERN.test(value);
}

export function lookupVariable(vars: Record<string, unknown>, variablePath: string): unknown {
	let current: unknown = vars;
	for (const segment of variablePath.split(".")) {
		if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, segment)) {
			return undefined;
		}
		current = current[segment];
	}
	return current;
}

/**
 * Substitutes `{{ dotted.path }}` lookups. Filters, tests and any other
 * expression syntax are rejected rather than rendered.
 */
export function renderTemplate(text: string, vars: Record<string, unknown>): string {
	return text.replace(EXPRESSION_PATTERN, (_match, expression: string) => {
		if (!isVariablePath(expression)) {
			throw new TemplateError(`Unsupported template expression "{{ ${expression} }}"`);
		}
		const value = lookupVariable(vars, expression);
		if (value === undefined || value === null) {
			throw new TemplateError(`Undefined variable "${expression}"`);
		}
		if (typeof value === "object") {
			throw new TemplateError(`Variable "${expression}" is not a scalar value`);
		}
		return String(value);
	});
}

export function setVariable(
	vars: Record<string, unknown>,
	variablePath: string,
	value: unknown,
): Record<string, unknown> {
	const [head, ...rest] = variablePath.split(".");
	if (rest.length === 0) {
		return { ...vars, [head]: value };
	}
	const child = vars[head];
	return {
		...vars,
		[head]: setVariable(isRecord(child) ? child : {}, rest.join("."), value),
	};
}
