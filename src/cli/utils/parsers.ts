// =============================================================================
// Option value parsers — invalid values become commander usage errors
// =============================================================================

import { InvalidArgumentError } from "commander";
import { describeUrlProblem } from "../../config/validate.js";
import { maskCredentials } from "../../logger/redact.js";

export function parseRetentionPeriod(value: string): number {
	const days = Number(value);
	if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(days)) {
		throw new InvalidArgumentError("Retention period must be a whole number of days (0 or more).");
	}
	return days;
}

export function parseTimeout(value: string): number {
	const ms = Number(value);
	if (!/^\d+$/.test(value.trim()) || ms <= 0) {
		throw new InvalidArgumentError("Timeout must be a positive number of milliseconds.");
	}
	return ms;
}

export function parseUrl(value: string): string {
	const problem = describeUrlProblem(value);
	if (problem) {
		throw new InvalidArgumentError(`Cluster URL ${problem}.`);
	}
	return value;
}

/** Mask credentials embedded in URLs, auth headers and key=value pairs before printing. */
export function sanitizeErrorMessage(message: string): string {
	return maskCredentials(message).replace(/(password|token|secret)[=:]\s*\S+/gi, "$1=***");
}
