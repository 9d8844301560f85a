import { describe, it, expect } from "vitest";
import {
	PlaceholderCodec,
	DEFAULT_PLACEHOLDER_SPECS,
	markerFor,
} from "../../../src/core/placeholder-codec.js";

describe("PlaceholderCodec", () => {
	const codec = new PlaceholderCodec();

	describe("escape", () => {
		it("should replace brace and percent-paren placeholders in discovery order", () => {
			const result = codec.escape("Hello {name}, you have %(count)d messages");

			expect(result.text).toBe("Hello __PLACEHOLDER_0__, you have __PLACEHOLDER_1__ messages");
			expect(result.tokens).toEqual([
				{ original: "{name}", style: "brace", token: "__PLACEHOLDER_0__" },
				{ original: "%(count)d", style: "percent-paren", token: "__PLACEHOLDER_1__" },
			]);
		});

		it("should number every match of an earlier spec before later specs", () => {
			const result = codec.escape("%s then {x}");

			expect(result.text).toBe("__PLACEHOLDER_1__ then __PLACEHOLDER_0__");
			expect(result.tokens.map((t) => t.original)).toEqual(["{x}", "%s"]);
		});

		it("should give each duplicate placeholder its own token", () => {
			const result = codec.escape("{a} and {a}");

			expect(result.text).toBe("__PLACEHOLDER_0__ and __PLACEHOLDER_1__");
			expect(result.tokens).toHaveLength(2);
		});

		it("should return empty tokens for text without placeholders", () => {
			expect(codec.escape("Plain text")).toEqual({ text: "Plain text", tokens: [] });
			expect(codec.escape("")).toEqual({ text: "", tokens: [] });
		});

		it("should recognize angle-percent templates", () => {
			const result = codec.escape("Hi <%= name %>!");

			expect(result.text).toBe("Hi __PLACEHOLDER_0__!");
			expect(result.tokens[0]?.style).toBe("angle-percent");
		});

		it("should let brace claim the braces of %{x}, ${x} and {{x}}", () => {
			expect(codec.escape("%{count}").text).toBe("%__PLACEHOLDER_0__");
			expect(codec.escape("${user}").text).toBe("$__PLACEHOLDER_0__");

			const doubled = codec.escape("{{name}}");
			expect(doubled.text).toBe("__PLACEHOLDER_0__}");
			expect(doubled.tokens).toEqual([
				{ original: "{{name}", style: "brace", token: "__PLACEHOLDER_0__" },
			]);
		});

		it("should apply a custom spec order", () => {
			const doubleFirst = new PlaceholderCodec([
				{ pattern: /\{\{[^}]+\}\}/, style: "double-brace" },
				...DEFAULT_PLACEHOLDER_SPECS,
			]);

			const result = doubleFirst.escape("{{name}}");
			expect(result.text).toBe("__PLACEHOLDER_0__");
			expect(result.tokens[0]?.style).toBe("double-brace");
		});
	});

	describe("restore", () => {
		it("should round-trip text through escape and restore", () => {
			const source = "Hello {name}, you have %(count)d messages and %s more";
			const escaped = codec.escape(source);

			expect(codec.restore(escaped.text, escaped.tokens)).toBe(source);
		});

		it.each([
			["percent-brace", "Total: %{count} items"],
			["dollar-brace", "Welcome back, ${user}!"],
			["angle-percent", "Signed in as <% name %>"],
			["double-brace", "Hi {{name}}, see {{link}}"],
			["every style", "{a} %{b} <% c %> ${d} %(e)s %i {{f}} done"],
		])("should round-trip %s text", (_style, source) => {
			const escaped = codec.escape(source);

			expect(escaped.text).not.toBe(source);
			expect(codec.restore(escaped.text, escaped.tokens)).toBe(source);
			expect(codec.verifyIntegrity(source, escaped.tokens)).toBe(true);
		});

		it("should restore markers the model moved around", () => {
			const escaped = codec.escape("Hello {name}, you have %(count)d messages");

			expect(
				codec.restore("__PLACEHOLDER_1__ Nachrichten für __PLACEHOLDER_0__", escaped.tokens)
			).toBe("%(count)d Nachrichten für {name}");
		});

		it("should not expand a marker that appears inside a restored original", () => {
			const escaped = codec.escape("{__PLACEHOLDER_1__} %s");

			expect(escaped.text).toBe("__PLACEHOLDER_0__ __PLACEHOLDER_1__");
			expect(codec.restore(escaped.text, escaped.tokens)).toBe("{__PLACEHOLDER_1__} %s");
		});

		it("should leave unknown markers untouched", () => {
			const escaped = codec.escape("Hi {name}");

			expect(codec.restore("__PLACEHOLDER_0__ __PLACEHOLDER_9__", escaped.tokens)).toBe(
				"{name} __PLACEHOLDER_9__"
			);
		});

		it("should return the text unchanged when there are no tokens", () => {
			expect(codec.restore("__PLACEHOLDER_0__", [])).toBe("__PLACEHOLDER_0__");
		});
	});

	describe("findLost", () => {
		it("should list originals missing from the restored text", () => {
			const escaped = codec.escape("Hello {name}, you have %(count)d messages");

			expect(codec.findLost("Hallo {name}", escaped.tokens)).toEqual(["%(count)d"]);
			expect(codec.verifyIntegrity("Hallo {name}", escaped.tokens)).toBe(false);
			expect(codec.verifyIntegrity("{name}: %(count)d", escaped.tokens)).toBe(true);
		});
	});

	describe("extract", () => {
		it("should return distinct placeholders", () => {
			expect([...codec.extract("{a} %s {a}")]).toEqual(["{a}", "%s"]);
		});
	});

	it("should build markers from an index", () => {
		expect(markerFor(12)).toBe("__PLACEHOLDER_12__");
	});
});
