import { createHash } from "node:crypto";
import type { ContentStore } from "./store.js";

/** Lowercase hex SHA-256 digest. */
export type Fingerprint = string;

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/;

export function fingerprint(contents: Buffer | string): Fingerprint {
	return createHash("sha256").update(contents).digest("hex");
}

export async function fingerprintFile(store: ContentStore, filePath: string): Promise<Fingerprint> {
	const hash = createHash("sha256");
	for await (const chunk of store.readChunks(filePath)) {
		hash.update(chunk);
	}
	return hash.digest("hex");
}

export function isFingerprint(value: unknown): value is Fingerprint {
	return typeof value === "string" && FINGERPRINT_PATTERN.test(value);
}
