import { describe, expect, it } from "vitest";
import { collectSecretValues, REDACTED, redactSecrets } from "../src/utils/redact.js";

describe("secret redaction", () => {
	it("replaces every occurrence, longest value first", () => {
		expect(redactSecrets("token=test-secret-long; short=test-secret", ["test-secret", "test-secret-long"])).toBe(
			`token=${REDACTED}; short=${REDACTED}`,
		);
	});

	it("ignores values too short to redact safely", () => {
		expect(redactSecrets("a b c", ["a", "b"])).toBe("a b c");
	});

	it("collects nested scalar values", () => {
		expect(collectSecretValues({ registry: { user: "ci", password: "test-password" }, pin: 1234 })).toEqual([
			"ci",
			"test-password",
			"1234",
		]);
	});
});
