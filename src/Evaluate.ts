/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { debugEvaluate } from './Debug';
import type { ReadonlySparseMatrix } from './SparseMatrix';

/**
 * A test over a single cell value.
 * @public
 */
export type Predicate<T> = (value: T) => boolean;

/**
 * Counts the cells of `matrix` whose value satisfies `predicate`.
 *
 * Every logical cell is tested, row by row, including cells that only hold the default value. This answers "how many
 * cells satisfy the predicate", not "how many stored cells do", and costs a lookup per cell.
 * @public
 */
export function evaluate<T>(matrix: ReadonlySparseMatrix<T>, predicate: Predicate<T>): number {
	let matches = 0;
	for (let row = 1; row <= matrix.rowCount; row++) {
		for (let column = 1; column <= matrix.columnCount; column++) {
			debugEvaluate('testing (%d;%d)', row, column);
			if (predicate(matrix.lookup(row, column))) {
				matches++;
				debugEvaluate('match at (%d;%d)', row, column);
			}
		}
	}
	return matches;
}

/**
 * Stock predicates.
 * @public
 */
export namespace Predicates {
	export function isDivisibleBy(divisor: number): Predicate<number> {
		return (value) => value % divisor === 0;
	}

	export function startsWith(prefix: string): Predicate<string> {
		return (value) => value.startsWith(prefix);
	}
}
