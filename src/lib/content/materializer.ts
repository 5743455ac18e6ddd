import { IntegrityError, NotFoundError } from "../errors.js";
import { fingerprint } from "../fingerprint.js";
import type { Materializer } from "../reconcile/types.js";
import type { HttpClient } from "./http.js";
import type { Manifest } from "./manifest.js";

/**
 * Downloads one manifest entry from the unit's location and checks it against the checksum
 * the manifest declares before handing the bytes on.
 */
export function createRemoteMaterializer(options: {
	http: HttpClient;
	manifest: Manifest;
}): Materializer {
	const checksums = new Map(options.manifest.files.map((entry) => [entry.path, entry.checksum]));
	return {
		kind: "remote-manifest",
		materialize: async (unit) => {
			const expected = checksums.get(unit.name);
			if (expected === undefined) {
				throw new NotFoundError(unit.name, `${unit.name} is not listed in the manifest`);
			}
			const contents = await options.http.getBytes(unit.location);
			const actual = fingerprint(contents);
			if (actual !== expected) {
				throw new IntegrityError(unit.name, expected, actual);
			}
			return {
				kind: "file",
				file: { relativePath: unit.name, origin: "bytes", contents },
			};
		},
	};
}
