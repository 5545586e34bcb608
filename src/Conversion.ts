/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import type { ReadonlyMatrixCell } from './MatrixNode';
import { ReadonlySparseMatrix, SparseMatrix, SparseMatrixOptions } from './SparseMatrix';

/**
 * An explicit conversion from `TSource` to `TTarget`.
 * A matrix can only be converted to an element type for which such a function is supplied.
 * @public
 */
export type Converter<TSource, TTarget> = (value: TSource) => TTarget;

/**
 * Stock conversions between primitive element types.
 * @public
 */
export namespace Conversions {
	/** Keeps numbers as they are. */
	export const toFloat: Converter<number, number> = (value) => value;

	/** Truncates toward zero. */
	export const toInteger: Converter<number, number> = (value) => Math.trunc(value);

	/** Truncates toward zero, then wraps into [0, 2^32). */
	export const toUnsigned: Converter<number, number> = (value) => value >>> 0;

	/** Truncates toward zero. Throws a `RangeError` for non-finite values. */
	export const toBigInt: Converter<number, bigint> = (value) => BigInt(Math.trunc(value));

	export const toText: Converter<string | number | bigint | boolean, string> = (value) => String(value);
}

/**
 * Builds a matrix of `TTarget` with the dimensions and stored positions of `source`, converting the default value and
 * every stored value with `converter`.
 *
 * Cells are re-added in row-major order, so a converted value that equals the converted default fails the same
 * assertion {@link SparseMatrix.add} does. If anything fails, the partially built matrix is released and the error
 * propagates.
 */
export function convertSparseMatrix<TSource, TTarget>(
	source: ReadonlySparseMatrix<TSource>,
	converter: Converter<TSource, TTarget>,
	options?: SparseMatrixOptions<TTarget>
): SparseMatrix<TTarget> {
	return SparseMatrix.fromCells(
		source.rowCount,
		source.columnCount,
		converter(source.defaultValue),
		convertCells(source.cells(), converter),
		options
	);
}

function* convertCells<TSource, TTarget>(
	cells: Iterable<ReadonlyMatrixCell<TSource>>,
	converter: Converter<TSource, TTarget>
): IterableIterator<ReadonlyMatrixCell<TTarget>> {
	for (const { row, column, value } of cells) {
		yield { row, column, value: converter(value) };
	}
}
