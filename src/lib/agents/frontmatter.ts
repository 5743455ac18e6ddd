export type FrontmatterValue = string | string[];

export type FrontmatterDocument = {
	frontmatter: Record<string, FrontmatterValue>;
	body: string;
};

const FRONTMATTER_MARKER = "---";

function parseScalar(rawValue: string): string {
	const trimmed = rawValue.trim();
	if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
		// Unescape YAML double-quoted string escape sequences
		return trimmed.slice(1, -1).replace(/\\"/g, '"').replace(/\\\\/g, "\\");
	}
	if (trimmed.length >= 2 && trimmed.startsWith("'") && trimmed.endsWith("'")) {
		// Single-quoted strings only escape the quote itself
		return trimmed.slice(1, -1).replace(/''/g, "'");
	}
	return trimmed;
}

function parseInlineList(rawValue: string): string[] | null {
	const trimmed = rawValue.trim();
	if (!trimmed.startsWith("[") || !trimmed.endsWith("]")) {
		return null;
	}
	const inner = trimmed.slice(1, -1).trim();
	if (!inner) {
		return [];
	}
	return inner.split(",").map((item) => parseScalar(item));
}

function parseFrontmatter(lines: string[]): Record<string, FrontmatterValue> {
	const data: Record<string, FrontmatterValue> = {};
	let currentListKey: string | null = null;

	for (const line of lines) {
		const trimmed = line.trim();
		if (!trimmed || trimmed.startsWith("#")) {
			continue;
		}

		if (currentListKey) {
			const listMatch = trimmed.match(/^-\s+(.+)$/);
			if (listMatch) {
				const value = parseScalar(listMatch[1]);
				const existing = data[currentListKey];
				if (Array.isArray(existing)) {
					existing.push(value);
				} else {
					data[currentListKey] = [value];
				}
				continue;
			}
			currentListKey = null;
		}

		const match = trimmed.match(/^([A-Za-z0-9_-]+):\s*(.*)$/);
		if (!match) {
			continue;
		}
		const [, key, rawValue] = match;
		if (!rawValue) {
			currentListKey = key;
			if (!data[key]) {
				data[key] = [];
			}
			continue;
		}
		data[key] = parseInlineList(rawValue) ?? parseScalar(rawValue);
		currentListKey = null;
	}

	return data;
}

/**
 * Split a `---`-delimited header from the markdown body. Returns null when the document
 * has no complete header.
 */
export function extractFrontmatter(contents: string): FrontmatterDocument | null {
	const lines = contents.replace(/^\uFEFF/, "").split(/\r?\n/);
	if (lines[0]?.trim() !== FRONTMATTER_MARKER) {
		return null;
	}

	let endIndex = -1;
	for (let i = 1; i < lines.length; i += 1) {
		if (lines[i].trim() === FRONTMATTER_MARKER) {
			endIndex = i;
			break;
		}
	}

	if (endIndex === -1) {
		return null;
	}

	return {
		frontmatter: parseFrontmatter(lines.slice(1, endIndex)),
		body: lines
			.slice(endIndex + 1)
			.join("\n")
			.trim(),
	};
}

const PLAIN_SCALAR = /^[A-Za-z0-9_./][A-Za-z0-9 _.,/()'-]*$/;
const RESERVED_SCALARS = new Set(["true", "false", "yes", "no", "on", "off", "null", "~"]);

/**
 * Render a scalar for a YAML header, quoting anything a YAML reader could misread.
 */
export function formatScalar(value: string): string {
	const needsQuotes =
		!PLAIN_SCALAR.test(value) ||
		value.endsWith(" ") ||
		RESERVED_SCALARS.has(value.toLowerCase()) ||
		/^[0-9.+-]+$/.test(value);
	if (!needsQuotes) {
		return value;
	}
	return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
