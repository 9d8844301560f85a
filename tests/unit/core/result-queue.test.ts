import { describe, it, expect } from "vitest";
import { ResultQueue } from "../../../src/core/result-queue.js";

describe("ResultQueue", () => {
	it("should drain items in arrival order exactly once", () => {
		const queue = new ResultQueue<number>();
		queue.put(1);
		queue.put(2);

		expect(queue.size).toBe(2);
		expect(queue.drain()).toEqual([1, 2]);
		expect(queue.isEmpty()).toBe(true);
		expect(queue.drain()).toEqual([]);
	});

	it("should keep items put concurrently", async () => {
		const queue = new ResultQueue<string>();

		await Promise.all(
			["a", "b", "c"].map(async (value, i) => {
				await new Promise((resolve) => setTimeout(resolve, 3 - i));
				queue.put(value);
			})
		);

		expect(queue.drain().sort()).toEqual(["a", "b", "c"]);
	});
});
