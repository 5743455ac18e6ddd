import { createReadStream } from "node:fs";
import { copyFile, mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { toSyncError } from "./errors.js";

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type StoreEntry = {
	name: string;
	path: string;
	isDirectory: boolean;
	isFile: boolean;
};

/**
 * Byte-addressable view of the filesystem the reconciler reads and writes through.
 * Failures surface as NotFoundError or IoError.
 */
export type ContentStore = {
	exists(filePath: string): Promise<boolean>;
	isDirectory(filePath: string): Promise<boolean>;
	read(filePath: string): Promise<Buffer>;
	readChunks(filePath: string, chunkSize?: number): AsyncIterable<Buffer>;
	write(filePath: string, contents: Buffer | string): Promise<void>;
	list(directory: string): Promise<StoreEntry[]>;
	createDirAll(directory: string): Promise<void>;
	copy(from: string, to: string): Promise<void>;
};

async function statOrNull(filePath: string): Promise<Awaited<ReturnType<typeof stat>> | null> {
	try {
		return await stat(filePath);
	} catch (error) {
		const code = (error as NodeJS.ErrnoException).code;
		if (code === "ENOENT" || code === "ENOTDIR") {
			return null;
		}
		throw toSyncError(error, filePath);
	}
}

async function* readFileChunks(filePath: string, chunkSize: number): AsyncGenerator<Buffer> {
	const stream = createReadStream(filePath, { highWaterMark: chunkSize });
	try {
		for await (const chunk of stream) {
			yield Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
		}
	} catch (error) {
		throw toSyncError(error, filePath);
	} finally {
		stream.destroy();
	}
}

export const nodeContentStore: ContentStore = {
	async exists(filePath) {
		return (await statOrNull(filePath)) !== null;
	},
	async isDirectory(filePath) {
		const stats = await statOrNull(filePath);
		return stats?.isDirectory() ?? false;
	},
	async read(filePath) {
		try {
			return await readFile(filePath);
		} catch (error) {
			throw toSyncError(error, filePath);
		}
	},
	readChunks(filePath, chunkSize = DEFAULT_CHUNK_SIZE) {
		return readFileChunks(filePath, chunkSize);
	},
	async write(filePath, contents) {
		try {
			await mkdir(path.dirname(filePath), { recursive: true });
			await writeFile(filePath, contents);
		} catch (error) {
			throw toSyncError(error, filePath);
		}
	},
	async list(directory) {
		try {
			const entries = await readdir(directory, { withFileTypes: true });
			return entries
				.map((entry) => ({
					name: entry.name,
					path: path.join(directory, entry.name),
					isDirectory: entry.isDirectory(),
					isFile: entry.isFile(),
				}))
				.sort((left, right) => compareNames(left.name, right.name));
		} catch (error) {
			throw toSyncError(error, directory);
		}
	},
	async createDirAll(directory) {
		try {
			await mkdir(directory, { recursive: true });
		} catch (error) {
			throw toSyncError(error, directory);
		}
	},
	async copy(from, to) {
		try {
			await mkdir(path.dirname(to), { recursive: true });
			await copyFile(from, to);
		} catch (error) {
			throw toSyncError(error, from);
		}
	},
};

/**
 * Code-unit ordering, independent of locale.
 */
export function compareNames(left: string, right: string): number {
	if (left < right) {
		return -1;
	}
	return left > right ? 1 : 0;
}

export type CollectedFile = {
	relativePath: string;
	path: string;
};

/**
 * Every regular file below `root`, with `/`-separated relative paths, sorted.
 * Walks an explicit stack of pending directories. A missing root yields no files.
 */
export async function collectFiles(store: ContentStore, root: string): Promise<CollectedFile[]> {
	if (!(await store.isDirectory(root))) {
		return [];
	}

	const files: CollectedFile[] = [];
	const pending: string[] = [root];
	while (pending.length > 0) {
		const current = pending.pop();
		if (current === undefined) {
			break;
		}
		for (const entry of await store.list(current)) {
			if (entry.isDirectory) {
				pending.push(entry.path);
				continue;
			}
			if (!entry.isFile) {
				continue;
			}
			const relativePath = path.relative(root, entry.path).split(path.sep).join("/");
			files.push({ relativePath, path: entry.path });
		}
	}

	return files.sort((left, right) => compareNames(left.relativePath, right.relativePath));
}
