/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import registerDebug from 'debug';
import type { ReadonlySparseMatrix } from './SparseMatrix';

export const debugLifecycle = registerDebug('sparse-matrix:lifecycle');
export const debugInsert = registerDebug('sparse-matrix:insert');
export const debugEvaluate = registerDebug('sparse-matrix:evaluate');

/**
 * Renders the node chain of a matrix for diagnostics: its size, dimensions, default value, and the stored values in
 * chain order.
 * @example
 * ```
 * size: 2
 * rows: 3
 * columns: 2
 * default value: 999
 * | 2 | 5 |
 * ```
 */
export function describeSparseMatrix<T>(
	matrix: ReadonlySparseMatrix<T>,
	formatValue: (value: T) => string = String
): string {
	const values: string[] = [];
	for (const cell of matrix.cells()) {
		values.push(`${formatValue(cell.value)} | `);
	}
	return [
		`size: ${matrix.size}`,
		`rows: ${matrix.rowCount}`,
		`columns: ${matrix.columnCount}`,
		`default value: ${formatValue(matrix.defaultValue)}`,
		`| ${values.join('')}`.trimEnd(),
	].join('\n');
}
