// =============================================================================
// CREDENTIAL MASKING — applied to every log line and printed error
// =============================================================================
// The secrets this tool handles are the cluster password, which can surface
// as user-info in a URL, and the Basic auth header built from it.

const URL_USER_INFO = /(https?:\/\/)[^\s/@]+@/gi;

const AUTH_SCHEME = /\b(Basic|Bearer)\s+[A-Za-z0-9+/=._~-]+/g;

/** Replace URL user-info and auth header credentials with `***`. */
export function maskCredentials(text: string): string {
	return text.replace(URL_USER_INFO, "$1***@").replace(AUTH_SCHEME, "$1 ***");
}

function maskValue(value: unknown): unknown {
	if (typeof value === "string") return maskCredentials(value);
	if (Array.isArray(value)) {
		const items: unknown[] = value;
		return items.map((item) => (typeof item === "string" ? maskCredentials(item) : item));
	}
	return value;
}

/** Mask credentials in the string values of log data, and in string arrays one level down. */
export function redactData(
	data: Record<string, unknown> | undefined,
): Record<string, unknown> | undefined {
	if (!data) return data;
	return Object.fromEntries(Object.entries(data).map(([key, value]) => [key, maskValue(value)]));
}
