import { DEFAULT_CONTENT_DIR } from "../content-dir.js";
import { NetworkError } from "../errors.js";
import { MANIFEST_FILE_NAME } from "./manifest.js";

export type HttpClient = {
	getText(url: string): Promise<string>;
	getBytes(url: string): Promise<Buffer>;
};

export type FetchHttpClientOptions = {
	userAgent?: string;
	fetch?: typeof fetch;
};

const DEFAULT_USER_AGENT = "unitsync";

/**
 * Single GET per call through the global fetch. Non-2xx responses and transport failures
 * reject with NetworkError; nothing is retried.
 */
export function createFetchHttpClient(options: FetchHttpClientOptions = {}): HttpClient {
	const fetchImpl = options.fetch ?? fetch;
	const headers = { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT };

	const request = async (url: string): Promise<Response> => {
		let response: Response;
		try {
			response = await fetchImpl(url, { headers });
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			throw new NetworkError(url, `Request to ${url} failed: ${message}`);
		}
		if (!response.ok) {
			throw new NetworkError(
				url,
				`Request to ${url} failed with HTTP ${response.status}`,
				response.status,
			);
		}
		return response;
	};

	return {
		async getText(url) {
			const response = await request(url);
			return await response.text();
		},
		async getBytes(url) {
			const response = await request(url);
			return Buffer.from(await response.arrayBuffer());
		},
	};
}

function trimTrailingSlashes(value: string): string {
	return value.replace(/\/+$/, "");
}

export function manifestUrl(baseUrl: string): string {
	return `${trimTrailingSlashes(baseUrl)}/${DEFAULT_CONTENT_DIR}/${MANIFEST_FILE_NAME}`;
}

export function contentUrl(baseUrl: string, entryPath: string): string {
	const encoded = entryPath.split("/").map(encodeURIComponent).join("/");
	return `${trimTrailingSlashes(baseUrl)}/${DEFAULT_CONTENT_DIR}/${encoded}`;
}
