import { TemplateError } from "./errors.js";
import { isVariablePath, lookupVariable } from "./template.js";
import { isRecord } from "./yaml.js";

const PATH = "([A-Za-z_][A-Za-z0-9_.]*)";
const NUMBER_COMPARISON = new RegExp(`^${PATH}\\s*(==|!=|<=|>=|<|>)\\s*(-?\\d+)$`);
const STRING_COMPARISON = new RegExp(`^${PATH}\\s*(==|!=)\\s*(["'])(.*)\\3$`);
const TEST_EXPRESSION = new RegExp(
	`^${PATH}\\s+is\\s+(not\\s+)?(succeeded|success|failed|failure|skipped|changed|defined|undefined)$`,
);
const LITERALS: Record<string, boolean> = {
	true: true,
	True: true,
	yes: true,
	false: false,
	False: false,
	no: false,
};

/**
 * Evaluates an Ansible `when` condition against registered results and
 * variables. Supports comparisons, result tests, `not`, `and` and `or`
 * without parentheses.
 */
export function evaluateGuard(expression: string, vars: Record<string, unknown>): boolean {
	const trimmed = expression.trim();
	if (trimmed.length === 0) {
		throw new TemplateError("Empty condition");
	}
	if (trimmed.includes("(") || trimmed.includes(")")) {
		throw new TemplateError(`Unsupported condition "${trimmed}"`);
	}
	return splitOn(trimmed, "or").some((clause) =>
		splitOn(clause, "and").every((atom) => evaluateAtom(atom, vars)),
	);
}

export function evaluateGuards(conditions: string[], vars: Record<string, unknown>): boolean {
	return conditions.every((condition) => evaluateGuard(condition, vars));
}

function splitOn(expression: string, keyword: "and" | "or"): string[] {
	return expression.split(new RegExp(`\\s+${keyword}\\s+`)).map((part) => part.trim());
}

function evaluateAtom(atom: string, vars: Record<string, unknown>): boolean {
	if (Object.prototype.hasOwnProperty.call(LITERALS, atom)) {
		return LITERALS[atom];
	}

	const negated = atom.match(/^not\s+(.+)$/);
	if (negated) {
		return !evaluateAtom(negated[1].trim(), vars);
	}

	const numeric = atom.match(NUMBER_COMPARISON);
	if (numeric) {
		const [, variablePath, operator, literal] = numeric;
		const value = requireVariable(vars, variablePath);
		if (typeof value !== "number") {
			throw new TemplateError(`Variable "${variablePath}" is not a number`);
		}
		return compare(value, operator, Number(literal));
	}

	const text = atom.match(STRING_COMPARISON);
	if (text) {
		const [, variablePath, operator, , literal] = text;
		const value = String(requireVariable(vars, variablePath));
		return operator === "==" ? value === literal : value !== literal;
	}

	const test = atom.match(TEST_EXPRESSION);
	if (test) {
		const [, variablePath, not, name] = test;
		const result = applyTest(vars, variablePath, name);
		return not ? !result : result;
	}

	if (isVariablePath(atom)) {
		return isTruthy(requireVariable(vars, atom));
	}

	throw new TemplateError(`Unsupported condition "${atom}"`);
}

function applyTest(vars: Record<string, unknown>, variablePath: string, name: string): boolean {
	if (name === "defined") {
		return lookupVariable(vars, variablePath) !== undefined;
	}
	if (name === "undefined") {
		return lookupVariable(vars, variablePath) === undefined;
	}

	const value = requireVariable(vars, variablePath);
	if (!isRecord(value)) {
		throw new TemplateError(`Variable "${variablePath}" is not a registered task result`);
	}
	switch (name) {
		case "succeeded":
		case "success":
			return value.failed !== true;
		case "failed":
		case "failure":
			return value.failed === true;
		case "skipped":
			return value.skipped === true;
		default:
			return value.changed === true;
	}
}

function requireVariable(vars: Record<string, unknown>, variablePath: string): unknown {
	const value = lookupVariable(vars, variablePath);
	if (value === undefined) {
		throw new TemplateError(`Undefined variable "${variablePath}"`);
	}
	return value;
}

function compare(left: number, operator: string, right: number): boolean {
	switch (operator) {
		case "==":
			return left === right;
		case "!=":
			return left !== right;
		case "<":
			return left < right;
		case "<=":
			return left <= right;
		case ">":
			return left > right;
		default:
			return left >= right;
	}
}

function isTruthy(value: unknown): boolean {
	if (Array.isArray(value)) {
		return value.length > 0;
	}
	if (isRecord(value)) {
		return Object.keys(value).length > 0;
	}
	return Boolean(value);
}
