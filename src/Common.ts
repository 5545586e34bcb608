/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

const defaultFailMessage = 'Assertion failed';

/**
 * Assertion failures in SparseMatrix will throw an exception containing this value as an `errorType`.
 *
 * Exporting this enables users to safely filter errors based on their type.
 *
 * @public
 */
export const sparseMatrixAssertionErrorType = 'SparseMatrixAssertion';

/**
 * Error object thrown by assertion failures in `SparseMatrix`.
 */
class SparseMatrixAssertionError extends Error {
	public readonly errorType = sparseMatrixAssertionErrorType;

	public constructor(message: string) {
		super(message);
		this.name = 'Assertion error';
		Error.captureStackTrace?.(this);
	}
}

/**
 * Returns if the supplied value is an error thrown by a failed `SparseMatrix` assertion.
 */
export function isSparseMatrixAssertionError(error: unknown): error is Error & { errorType: string } {
	return error instanceof SparseMatrixAssertionError;
}

/**
 * Asserts against a boolean condition. Throws an Error if the assertion failed. Will run and throw in release builds.
 * Use when violations are logic errors in the program.
 * @param condition - A condition to assert is truthy
 * @param message - Message to be printed if assertion fails. Will print "Assertion failed" by default
 */
export function assert(condition: unknown, message?: string): asserts condition {
	if (!condition) {
		fail(message);
	}
}

/**
 * Fails an assertion. Throws an Error that the assertion failed.
 * Use when violations are logic errors in the program.
 * @param message - Message to be printed if assertion fails. Will print "Assertion failed" by default
 */
export function fail(message: string = defaultFailMessage): never {
	if (process.env.NODE_ENV !== 'production') {
		console.error(message);
	}

	throw new SparseMatrixAssertionError(message);
}

/**
 * @returns true if `value` is an integer in the inclusive range [`min`, `max`].
 */
export function isIntegerInRange(value: number, min: number, max: number): boolean {
	return Number.isInteger(value) && value >= min && value <= max;
}

/**
 * Iterate through two iterables and return true if they yield equivalent elements in the same order.
 * @param iterableA - the first iterable to compare
 * @param iterableB - the second iterable to compare
 * @param elementComparator - the function used to check if two `T`s are equivalent.
 * Defaults to `Object.is()` equality (a shallow compare)
 */
export function compareIterables<T>(
	iterableA: Iterable<T>,
	iterableB: Iterable<T>,
	elementComparator: (a: T, b: T) => boolean = Object.is
): boolean {
	const iteratorA = iterableA[Symbol.iterator]();
	const iteratorB = iterableB[Symbol.iterator]();
	let a: IteratorResult<T>;
	let b: IteratorResult<T>;
	for (
		a = iteratorA.next(), b = iteratorB.next(); // Given two iterators...
		a.done !== true && b.done !== true; // ...while both have elements remaining...
		a = iteratorA.next(), b = iteratorB.next() // ...take one element at a time from each...
	) {
		// ...and ensure that their elements are equivalent
		if (!elementComparator(a.value, b.value)) {
			return false;
		}
	}

	// If one iterator is done, but not the other, then they are not equivalent
	return a.done === b.done;
}
