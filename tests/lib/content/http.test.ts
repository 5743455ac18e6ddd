import { contentUrl, createFetchHttpClient, manifestUrl } from "../../../src/lib/content/http.js";
import { NetworkError } from "../../../src/lib/errors.js";

describe("content urls", () => {
	it("places the manifest and entries under the content directory", () => {
		expect(manifestUrl("https://content.test/repo/")).toBe(
			"https://content.test/repo/.unitsync/manifest.json",
		);
		expect(contentUrl("https://content.test/repo", "agents/my agent/AGENT.md")).toBe(
			"https://content.test/repo/.unitsync/agents/my%20agent/AGENT.md",
		);
	});
});

describe("createFetchHttpClient", () => {
	it("sends one GET with the user agent and returns the body", async () => {
		const requests: Array<{ url: string; userAgent: string | null }> = [];
		const http = createFetchHttpClient({
			userAgent: "unitsync-test",
			fetch: async (input, init) => {
				requests.push({ url: String(input), userAgent: new Headers(init?.headers).get("User-Agent") });
				return new Response("payload", { status: 200 });
			},
		});

		expect(await http.getText("https://content.test/a")).toBe("payload");
		expect((await http.getBytes("https://content.test/b")).toString("utf8")).toBe("payload");
		expect(requests).toEqual([
			{ url: "https://content.test/a", userAgent: "unitsync-test" },
			{ url: "https://content.test/b", userAgent: "unitsync-test" },
		]);
	});

	it("rejects non-success responses with the status", async () => {
		const http = createFetchHttpClient({
			fetch: async () => new Response("missing", { status: 404 }),
		});

		const error = await http.getText("https://content.test/missing").catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(NetworkError);
		expect(error).toMatchObject({
			kind: "network",
			status: 404,
			url: "https://content.test/missing",
			message: "Request to https://content.test/missing failed with HTTP 404",
		});
	});

	it("wraps transport failures", async () => {
		const http = createFetchHttpClient({
			fetch: async () => {
				throw new TypeError("fetch failed");
			},
		});

		await expect(http.getBytes("https://content.test/x")).rejects.toMatchObject({
			kind: "network",
			status: null,
			message: "Request to https://content.test/x failed: fetch failed",
		});
	});
});
