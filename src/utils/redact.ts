export const REDACTED = "<redacted>";

const MIN_SECRET_LENGTH = 3;

export function redactSecrets(text: string, secrets: string[]): string {
	const values = secrets
		.filter((secret) => secret.length >= MIN_SECRET_LENGTH)
		.sort((left, right) => right.length - left.length);

	let redacted = text;
	for (const value of values) {
		redacted = redacted.split(value).join(REDACTED);
	}
	return redacted;
}

export function collectSecretValues(secrets: Record<string, unknown>): string[] {
	const values: string[] = [];
	const visit = (value: unknown): void => {
		if (typeof value === "string") {
			values.push(value);
		} else if (typeof value === "number") {
			values.push(String(value));
		} else if (Array.isArray(value)) {
			value.forEach(visit);
		} else if (typeof value === "object" && value !== null) {
			Object.values(value).forEach(visit);
		}
	};
	visit(secrets);
	return values;
}
