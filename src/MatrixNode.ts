/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * A stored, non-default cell of a sparse matrix.
 * @public
 */
export interface MatrixCell<T> {
	/** 1-based row of the cell. */
	readonly row: number;
	/** 1-based column of the cell. */
	readonly column: number;
	value: T;
}

/**
 * A stored cell viewed through a read-only handle.
 * @public
 */
export type ReadonlyMatrixCell<T> = Readonly<MatrixCell<T>>;

/**
 * A link in a matrix's node chain.
 * `next` is the owning link; `prev` is only used to splice new nodes in front of this one.
 */
export interface MatrixNode<T> {
	readonly cell: MatrixCell<T>;
	next: MatrixNode<T> | undefined;
	prev: MatrixNode<T> | undefined;
	/** Set once the owning matrix has dropped this node. */
	released: boolean;
}

export function createNode<T>(row: number, column: number, value: T): MatrixNode<T> {
	return { cell: { row, column, value }, next: undefined, prev: undefined, released: false };
}

/**
 * Orders positions row-major.
 * @returns a negative number if (`rowA`, `columnA`) sorts before (`rowB`, `columnB`), zero if they are the same
 * position, and a positive number otherwise.
 */
export function comparePositions(rowA: number, columnA: number, rowB: number, columnB: number): number {
	return rowA !== rowB ? rowA - rowB : columnA - columnB;
}
