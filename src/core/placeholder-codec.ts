/**
 * Placeholder protection for model calls.
 *
 * Template variables (`{name}`, `%(count)d`, `{{user}}`...) are swapped for
 * opaque `__PLACEHOLDER_<n>__` markers before text reaches a model and swapped
 * back afterwards. Specs run in a fixed order; once a span is tokenized it is
 * invisible to every later spec.
 */

export interface PlaceholderSpec {
	readonly pattern: RegExp;
	readonly style: string;
}

export interface PlaceholderToken {
	readonly original: string;
	readonly style: string;
	readonly token: string;
}

export interface EscapeResult {
	text: string;
	tokens: PlaceholderToken[];
}

type Segment =
	| { kind: "literal"; text: string }
	| { kind: "token"; token: PlaceholderToken };

/**
 * Recognized syntaxes, highest precedence first. Brace comes first on purpose:
 * it claims the `{...}` part of `%{x}`, `${x}` and `{{x}}` text, and changing
 * the order changes which style wins.
 */
export const DEFAULT_PLACEHOLDER_SPECS: readonly PlaceholderSpec[] = Object.freeze([
	{ pattern: /\{[^}]+\}/, style: "brace" },
	{ pattern: /%\{[^}]+\}/, style: "percent-brace" },
	{ pattern: /<%[^%>]+%>/, style: "angle-percent" },
	{ pattern: /\$\{[^}]+\}/, style: "dollar-brace" },
	{ pattern: /%\([^)]+\)[sdfi]/, style: "percent-paren" },
	{ pattern: /%[sdfi]/, style: "percent" },
	{ pattern: /\{\{[^}]+\}\}/, style: "double-brace" },
]);

const MARKER_PATTERN = /__PLACEHOLDER_(\d+)__/g;

export const markerFor = (index: number): string => `__PLACEHOLDER_${index}__`;

const markerIndex = (marker: string): number => {
	const match = /__PLACEHOLDER_(\d+)__/.exec(marker);
	return match ? Number(match[1]) : Number.MAX_SAFE_INTEGER;
};

const toGlobal = (pattern: RegExp): RegExp =>
	new RegExp(pattern.source, pattern.flags.includes("g") ? pattern.flags : `${pattern.flags}g`);

export class PlaceholderCodec {
	readonly specs: readonly PlaceholderSpec[];

	constructor(specs: readonly PlaceholderSpec[] = DEFAULT_PLACEHOLDER_SPECS) {
		this.specs = Object.freeze([...specs]);
	}

	/**
	 * Replace every recognized placeholder with a numbered marker.
	 * Markers are numbered in discovery order: all matches of the first spec
	 * (left to right), then the second spec over what is left, and so on.
	 */
	escape(text: string): EscapeResult {
		const tokens: PlaceholderToken[] = [];
		let segments: Segment[] = text ? [{ kind: "literal", text }] : [];

		for (const spec of this.specs) {
			const next: Segment[] = [];
			for (const segment of segments) {
				if (segment.kind === "token") {
					next.push(segment);
				} else {
					next.push(...this.claim(segment.text, spec, tokens));
				}
			}
			segments = next;
		}

		return {
			text: segments
				.map((segment) => (segment.kind === "token" ? segment.token.token : segment.text))
				.join(""),
			tokens,
		};
	}

	/**
	 * Put the original placeholders back. Runs as one pass over the text, so a
	 * marker inside a restored original is never expanded a second time, and
	 * markers with no matching token are left as they are.
	 */
	restore(text: string, tokens: readonly PlaceholderToken[]): string {
		if (tokens.length === 0) return text;

		const originals = new Map<string, string>();
		const ordered = [...tokens].sort((a, b) => markerIndex(a.token) - markerIndex(b.token));
		for (const token of ordered) {
			if (!originals.has(token.token)) {
				originals.set(token.token, token.original);
			}
		}

		return text.replace(MARKER_PATTERN, (marker) => originals.get(marker) ?? marker);
	}

	/**
	 * Originals that do not appear in the restored text.
	 */
	findLost(restoredText: string, tokens: readonly PlaceholderToken[]): string[] {
		return tokens
			.filter((token) => !restoredText.includes(token.original))
			.map((token) => token.original);
	}

	verifyIntegrity(restoredText: string, tokens: readonly PlaceholderToken[]): boolean {
		return this.findLost(restoredText, tokens).length === 0;
	}

	/**
	 * Distinct placeholder strings in a text.
	 */
	extract(text: string): Set<string> {
		return new Set(this.escape(text).tokens.map((token) => token.original));
	}

	private claim(text: string, spec: PlaceholderSpec, tokens: PlaceholderToken[]): Segment[] {
		const segments: Segment[] = [];
		const regex = toGlobal(spec.pattern);
		let cursor = 0;
		let match: RegExpExecArray | null;

		while ((match = regex.exec(text)) !== null) {
			const original = match[0];
			if (original === "") {
				regex.lastIndex++;
				continue;
			}

			if (match.index > cursor) {
				segments.push({ kind: "literal", text: text.slice(cursor, match.index) });
			}

			const token: PlaceholderToken = {
				original,
				style: spec.style,
				token: markerFor(tokens.length),
			};
			tokens.push(token);
			segments.push({ kind: "token", token });
			cursor = match.index + original.length;
		}

		if (cursor < text.length) {
			segments.push({ kind: "literal", text: text.slice(cursor) });
		}

		return segments;
	}
}

/**
 * Codec with the default specs.
 */
export const defaultCodec = new PlaceholderCodec();

export default PlaceholderCodec;
