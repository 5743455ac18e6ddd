import path from "node:path";
import { IoError } from "./errors.js";
import { type ContentStore, compareNames } from "./store.js";

/**
 * How a unit is recognized inside a root directory: a child directory holding a marker file,
 * or a child file with a given suffix (the unit name is the file stem).
 */
export type UnitPredicate =
	| { type: "marker"; fileName: string }
	| { type: "suffix"; suffix: string };

export type DiscoveredUnit = {
	name: string;
	location: string;
};

export async function discoverUnits(
	store: ContentStore,
	root: string,
	predicate: UnitPredicate,
): Promise<DiscoveredUnit[]> {
	if (!(await store.exists(root))) {
		return [];
	}
	if (!(await store.isDirectory(root))) {
		throw new IoError(`Not a directory: ${root}`);
	}

	const units = new Map<string, string>();
	for (const entry of await store.list(root)) {
		if (predicate.type === "marker") {
			if (entry.isDirectory && (await store.exists(path.join(entry.path, predicate.fileName)))) {
				units.set(entry.name, entry.path);
			}
			continue;
		}
		if (
			entry.isFile &&
			entry.name.endsWith(predicate.suffix) &&
			entry.name.length > predicate.suffix.length
		) {
			units.set(entry.name.slice(0, -predicate.suffix.length), entry.path);
		}
	}

	return [...units.entries()]
		.map(([name, location]) => ({ name, location }))
		.sort((left, right) => compareNames(left.name, right.name));
}
