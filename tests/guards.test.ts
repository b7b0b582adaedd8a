import { describe, expect, it } from "vitest";
import { TemplateError } from "../src/core/errors.js";
import { evaluateGuard, evaluateGuards } from "../src/core/guards.js";

const vars = {
	yum_installed: { rc: 0, failed: false, skipped: false, changed: true },
	apt_get_installed: { rc: 127, failed: true, skipped: false, changed: true },
	dnf_installed: { skipped: true, changed: false, failed: false },
	distro: "centos",
	enabled: true,
	packages: [],
};

describe("guard evaluation", () => {
	it("compares registered return codes", () => {
		expect(evaluateGuard("yum_installed.rc == 0", vars)).toBe(true);
		expect(evaluateGuard("apt_get_installed.rc == 0", vars)).toBe(false);
		expect(evaluateGuard("apt_get_installed.rc != 0", vars)).toBe(true);
		expect(evaluateGuard("apt_get_installed.rc >= 100", vars)).toBe(true);
	});

	it("applies result tests", () => {
		expect(evaluateGuard("yum_installed is succeeded", vars)).toBe(true);
		expect(evaluateGuard("apt_get_installed is failed", vars)).toBe(true);
		expect(evaluateGuard("dnf_installed is skipped", vars)).toBe(true);
		expect(evaluateGuard("dnf_installed is not changed", vars)).toBe(true);
		expect(evaluateGuard("missing is undefined", vars)).toBe(true);
		expect(evaluateGuard("distro is defined", vars)).toBe(true);
	});

	it("combines clauses with not, and and or", () => {
		expect(evaluateGuard("not enabled", vars)).toBe(false);
		expect(evaluateGuard("enabled and distro == 'centos'", vars)).toBe(true);
		expect(evaluateGuard('distro == "ubuntu" or yum_installed.rc == 0', vars)).toBe(true);
		expect(evaluateGuard("packages or false", vars)).toBe(false);
	});

	it("requires every listed condition", () => {
		expect(evaluateGuards([], vars)).toBe(true);
		expect(evaluateGuards(["enabled", "yum_installed.rc == 0"], vars)).toBe(true);
		expect(evaluateGuards(["enabled", "apt_get_installed.rc == 0"], vars)).toBe(false);
	});

	it("fails on undefined variables", () => {
		expect(() => evaluateGuard("zypper_installed.rc == 0", vars)).toThrow(
			new TemplateError('Undefined variable "zypper_installed.rc"'),
		);
	});

	it("reads a skipped registration's missing rc as undefined", () => {
		expect(() => evaluateGuard("dnf_installed.rc == 0", vars)).toThrow(
			'Undefined variable "dnf_installed.rc"',
		);
	});

	it("rejects expressions it cannot evaluate", () => {
		expect(() => evaluateGuard("(enabled)", vars)).toThrow('Unsupported condition "(enabled)"');
		expect(() => evaluateGuard("distro | lower == 'centos'", vars)).toThrow(TemplateError);
		expect(() => evaluateGuard("distro.rc == 0", vars)).toThrow(
			'Undefined variable "distro.rc"',
		);
		expect(() => evaluateGuard("distro is failed", vars)).toThrow(
			'Variable "distro" is not a registered task result',
		);
		expect(() => evaluateGuard("   ", vars)).toThrow("Empty condition");
	});
});
