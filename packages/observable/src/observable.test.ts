import { describe, expect, it, vi } from "vitest";
import { SimpleObservable, observable } from "./observable.js";
import { filter, map, take } from "./operators.js";

const collect = <T>(source$: SimpleObservable<T>) => {
	const values: T[] = [];
	const result = { values, completed: 0 };
	source$.subscribe({
		next: (value) => values.push(value),
		complete: () => {
			result.completed++;
		},
	});
	return result;
};

describe("SimpleObservable", () => {
	describe("creation", () => {
		it("should emit every value from of() and complete", () => {
			expect(collect(SimpleObservable.of(1, 2, 3))).toEqual({
				values: [1, 2, 3],
				completed: 1,
			});
		});

		it("should emit from an iterable", () => {
			expect(collect(SimpleObservable.from(new Set(["a", "b"]))).values).toEqual([
				"a",
				"b",
			]);
		});

		it("should complete empty() without values", () => {
			expect(collect(SimpleObservable.empty<number>())).toEqual({
				values: [],
				completed: 1,
			});
		});

		it("should accept a bare next function", () => {
			const seen: number[] = [];
			SimpleObservable.of(4, 5).subscribe((v) => seen.push(v));

			expect(seen).toEqual([4, 5]);
		});
	});

	describe("subscription lifecycle", () => {
		it("should stop delivery and run cleanup on unsubscribe", () => {
			let emit: ((value: number) => void) | undefined;
			const cleanup = vi.fn();
			const source$ = observable<number>((observer) => {
				emit = (value) => observer.next(value);
				return cleanup;
			});
			const seen: number[] = [];
			const subscription = source$.subscribe((v) => seen.push(v));

			emit?.(1);
			subscription.unsubscribe();
			emit?.(2);
			subscription.unsubscribe();

			expect(seen).toEqual([1]);
			expect(cleanup).toHaveBeenCalledTimes(1);
			expect(subscription.closed).toBe(true);
		});

		it("should ignore values after complete", () => {
			const cleanup = vi.fn();
			const source$ = new SimpleObservable<number>((observer) => {
				observer.next(1);
				observer.complete?.();
				observer.next(2);
				return cleanup;
			});

			const result = collect(source$);

			expect(result).toEqual({ values: [1], completed: 1 });
			expect(cleanup).toHaveBeenCalledTimes(1);
		});

		it("should report a thrown non-Error as an Error", () => {
			const source$ = new SimpleObservable<number>(() => {
				throw "producer failed";
			});
			const errors: unknown[] = [];

			source$.subscribe({ next: () => {}, error: (e) => errors.push(e) });

			expect(errors).toEqual([new Error("producer failed")]);
			expect(errors[0]).toBeInstanceOf(Error);
		});

		it("should rethrow an error nobody handles", () => {
			const source$ = new SimpleObservable<number>(() => {
				throw new Error("unhandled");
			});

			expect(() => source$.subscribe(() => {})).toThrow("unhandled");
		});

		it("should rethrow an error signalled to an observer without a handler", () => {
			const source$ = new SimpleObservable<number>((observer) => {
				observer.error?.(new Error("signalled"));
			});

			expect(() => source$.subscribe(() => {})).toThrow("signalled");
		});
	});

	describe("operators", () => {
		it("should map values", () => {
			expect(collect(SimpleObservable.of(1, 2).map((v) => v * 3)).values).toEqual([
				3, 6,
			]);
		});

		it("should filter values", () => {
			expect(
				collect(SimpleObservable.of(1, 2, 3, 4).filter((v) => v > 2)).values,
			).toEqual([3, 4]);
		});

		it("should take the first values then complete once", () => {
			expect(collect(SimpleObservable.of(1, 2, 3).take(2))).toEqual({
				values: [1, 2],
				completed: 1,
			});
		});

		it("should complete take(0) without subscribing upstream", () => {
			const producer = vi.fn();
			const source$ = new SimpleObservable<number>(producer);

			expect(collect(source$.take(0))).toEqual({ values: [], completed: 1 });
			expect(producer).not.toHaveBeenCalled();
		});

		it("should detach take() from an open-ended source", () => {
			let emit: ((value: number) => void) | undefined;
			const cleanup = vi.fn();
			const source$ = new SimpleObservable<number>((observer) => {
				emit = (value) => observer.next(value);
				return cleanup;
			});

			const result = collect(source$.take(1));
			emit?.(7);
			emit?.(8);

			expect(result).toEqual({ values: [7], completed: 1 });
			expect(cleanup).toHaveBeenCalledTimes(1);
		});

		it("should compose operators with pipe", () => {
			const result$ = SimpleObservable.of(1, 2, 3, 4, 5, 6).pipe(
				filter((v: number) => v % 2 === 0),
				map((v: number) => v * 10),
				take<number>(2),
			);

			expect(collect(result$)).toEqual({ values: [20, 40], completed: 1 });
		});
	});
});
