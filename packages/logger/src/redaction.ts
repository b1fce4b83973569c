/**
 * Redaction paths for pino.
 *
 * Credentials never belong in logs, including when a whole config or
 * request object is logged as a field.
 */

const SENSITIVE_KEYS = ["apiKey", "secret", "privateKey", "authorization", "password"] as const;

export const DEFAULT_REDACT_PATHS: readonly string[] = SENSITIVE_KEYS.flatMap((key) => [
	key,
	`*.${key}`,
]);

export function mergeRedactPaths(extra: readonly string[] = []): string[] {
	return [...new Set([...DEFAULT_REDACT_PATHS, ...extra])];
}
