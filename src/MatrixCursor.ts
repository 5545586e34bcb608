/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { assert, fail } from './Common';
import type { MatrixCell, MatrixNode, ReadonlyMatrixCell } from './MatrixNode';

/**
 * A forward cursor over the stored cells of a sparse matrix, in row-major order.
 * The end marker is the cursor that points at no cell.
 *
 * Cursors borrow the matrix's node chain: they are invalidated when the matrix is disposed or assigned to.
 * @public
 */
export class ReadonlyMatrixCursor<T> {
	public constructor(protected node: MatrixNode<T> | undefined) {}

	/**
	 * @returns true if this cursor is past the last stored cell.
	 */
	public get atEnd(): boolean {
		return this.node === undefined;
	}

	/**
	 * The cell under the cursor.
	 */
	public get cell(): ReadonlyMatrixCell<T> {
		return this.currentNode().cell;
	}

	/**
	 * Moves to the next stored cell, or to the end marker after the last one.
	 * @returns this cursor
	 */
	public advance(): this {
		this.node = this.currentNode().next;
		return this;
	}

	/**
	 * @returns true if both cursors point at the same cell (or are both end markers). Mutable and read-only cursors
	 * compare equal when they share a position.
	 */
	public equals(other: ReadonlyMatrixCursor<T>): boolean {
		return this.node === other.node;
	}

	/**
	 * @returns a read-only cursor at the same position.
	 */
	public clone(): ReadonlyMatrixCursor<T> {
		return new ReadonlyMatrixCursor(this.node);
	}

	protected currentNode(): MatrixNode<T> {
		const node = this.node ?? fail('Cannot read past the end of a matrix.');
		assert(!node.released, 'Cursor was invalidated by its matrix.');
		return node;
	}
}

/**
 * A forward cursor through which stored values can be overwritten in place.
 * Writes to `cell.value` change the matrix directly.
 * @public
 */
export class MatrixCursor<T> extends ReadonlyMatrixCursor<T> {
	public get cell(): MatrixCell<T> {
		return this.currentNode().cell;
	}

	public clone(): MatrixCursor<T> {
		return new MatrixCursor(this.node);
	}
}
