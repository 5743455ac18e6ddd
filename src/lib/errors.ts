export const EXIT_CODES = {
	success: 0,
	"sync-error": 1,
	"invalid-usage": 2,
} as const;

export type ExitCodeReason = keyof typeof EXIT_CODES;
export type ExitCode = (typeof EXIT_CODES)[ExitCodeReason];

export function exitCodeFor(reason: ExitCodeReason): ExitCode {
	return EXIT_CODES[reason];
}

export type ErrorKind = "not-found" | "validation" | "integrity" | "io" | "network";

export type SyncStage = "discover" | "materialize" | "fingerprint" | "fetch" | "write";

export class SyncError extends Error {
	readonly kind: ErrorKind;
	readonly exitCode: ExitCode;

	constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "SyncError";
		this.kind = kind;
		this.exitCode = exitCodeFor("sync-error");
	}
}

export class NotFoundError extends SyncError {
	readonly path: string;

	constructor(path: string, message = `Not found: ${path}`) {
		super("not-found", message);
		this.name = "NotFoundError";
		this.path = path;
	}
}

export type ValidationIssue = {
	field: string;
	message: string;
};

export class ValidationError extends SyncError {
	readonly issues: ValidationIssue[];

	constructor(summary: string, issues: ValidationIssue[] = []) {
		super("validation", formatValidationMessage(summary, issues));
		this.name = "ValidationError";
		this.issues = issues;
	}
}

function formatValidationMessage(summary: string, issues: ValidationIssue[]): string {
	if (issues.length === 0) {
		return summary;
	}
	const lines = issues.map((issue) => `  - ${issue.field}: ${issue.message}`);
	return `${summary}:\n${lines.join("\n")}`;
}

/**
 * Raised when downloaded bytes do not hash to the fingerprint the manifest declared.
 */
export class IntegrityError extends SyncError {
	readonly expected: string;
	readonly actual: string;

	constructor(subject: string, expected: string, actual: string) {
		super("integrity", `Checksum mismatch for ${subject}: expected ${expected}, got ${actual}`);
		this.name = "IntegrityError";
		this.expected = expected;
		this.actual = actual;
	}
}

export class IoError extends SyncError {
	constructor(message: string, options?: { cause?: unknown }) {
		super("io", message, options);
		this.name = "IoError";
	}
}

export class NetworkError extends SyncError {
	readonly url: string;
	readonly status: number | null;

	constructor(url: string, message: string, status: number | null = null) {
		super("network", message);
		this.name = "NetworkError";
		this.url = url;
		this.status = status;
	}
}

function errnoCode(error: unknown): string | null {
	if (error && typeof error === "object" && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return null;
}

export function classifyError(error: unknown): ErrorKind {
	if (error instanceof SyncError) {
		return error.kind;
	}
	if (errnoCode(error) === "ENOENT") {
		return "not-found";
	}
	return "io";
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a Node filesystem error in the sync error taxonomy, keeping the original as the cause.
 */
export function toSyncError(error: unknown, path: string): SyncError {
	if (error instanceof SyncError) {
		return error;
	}
	if (errnoCode(error) === "ENOENT") {
		return new NotFoundError(path);
	}
	return new IoError(`${describeError(error)} (${path})`, { cause: error });
}
