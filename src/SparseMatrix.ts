/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import type { IDisposable, ITelemetryBaseLogger } from '@fluidframework/core-interfaces';
import { assert, compareIterables, fail, isIntegerInRange } from './Common';
import { debugInsert, debugLifecycle } from './Debug';
import { MatrixCursor, ReadonlyMatrixCursor } from './MatrixCursor';
import { comparePositions, createNode, MatrixCell, MatrixNode, ReadonlyMatrixCell } from './MatrixNode';

function strictEquals<T>(a: T, b: T): boolean {
	return a === b;
}

/**
 * Options used to customize a {@link SparseMatrix}.
 * @public
 */
export interface SparseMatrixOptions<T> {
	/**
	 * Decides whether a value equals the default value, which may not be stored.
	 * Defaults to strict equality (`===`), so `-0` equals `0` and `NaN` never equals anything.
	 */
	readonly areEqual?: (a: T, b: T) => boolean;
	/**
	 * Receives an error event whenever building a matrix (copy, assignment, conversion) is rolled back.
	 */
	readonly logger?: ITelemetryBaseLogger;
}

/**
 * The read-only view of a {@link SparseMatrix}.
 * @public
 */
export interface ReadonlySparseMatrix<T> extends Iterable<ReadonlyMatrixCell<T>> {
	readonly rowCount: number;
	readonly columnCount: number;
	/** The number of stored cells. */
	readonly size: number;
	/** The value of every cell that is not stored. */
	readonly defaultValue: T;

	/**
	 * @returns the value at (`row`, `column`), which is the default value unless a cell is stored there.
	 */
	lookup(row: number, column: number): T;

	/**
	 * @returns true if a cell is stored at (`row`, `column`).
	 */
	has(row: number, column: number): boolean;

	/**
	 * @returns the stored cells in row-major order.
	 */
	cells(): IterableIterator<ReadonlyMatrixCell<T>>;

	beginReadonly(): ReadonlyMatrixCursor<T>;
	endReadonly(): ReadonlyMatrixCursor<T>;
}

/**
 * A fixed-size grid of `T` in which only explicitly added cells are stored. Every other cell holds the default value.
 *
 * Stored cells live in a doubly linked chain sorted row-major, so insertion and lookup are linear in the number of
 * stored cells. Positions are 1-based.
 * @public
 */
export class SparseMatrix<T> implements ReadonlySparseMatrix<T>, IDisposable {
	private head: MatrixNode<T> | undefined;
	private rows: number;
	private columns: number;
	private count = 0;
	private defaultCellValue: T;
	private areEqual: (a: T, b: T) => boolean;
	private readonly logger: ITelemetryBaseLogger | undefined;
	private isDisposed = false;

	/**
	 * @param rows - number of rows, a positive integer
	 * @param columns - number of columns, a positive integer
	 * @param defaultValue - the value of every cell that is not stored
	 */
	public constructor(rows: number, columns: number, defaultValue: T, options: SparseMatrixOptions<T> = {}) {
		assert(Number.isInteger(rows) && rows > 0, 'A matrix must have a positive number of rows.');
		assert(Number.isInteger(columns) && columns > 0, 'A matrix must have a positive number of columns.');
		this.rows = rows;
		this.columns = columns;
		this.defaultCellValue = defaultValue;
		this.areEqual = options.areEqual ?? strictEquals;
		this.logger = options.logger;
		debugLifecycle('created %dx%d matrix', rows, columns);
	}

	/**
	 * Builds a matrix from a sequence of cells, adding each in turn.
	 * If adding any cell fails, the cells added so far are released before the error propagates.
	 */
	public static fromCells<T>(
		rows: number,
		columns: number,
		defaultValue: T,
		cells: Iterable<ReadonlyMatrixCell<T>>,
		options: SparseMatrixOptions<T> = {}
	): SparseMatrix<T> {
		const matrix = new SparseMatrix(rows, columns, defaultValue, options);
		try {
			for (const { row, column, value } of cells) {
				matrix.add(row, column, value);
			}
		} catch (error) {
			matrix.reportRollback(error);
			matrix.dispose();
			throw error;
		}
		return matrix;
	}

	public get rowCount(): number {
		return this.rows;
	}

	public get columnCount(): number {
		return this.columns;
	}

	public get size(): number {
		return this.count;
	}

	/**
	 * The value of every cell that is not stored.
	 * Changing it does not affect cells that are already stored.
	 */
	public get defaultValue(): T {
		return this.defaultCellValue;
	}

	public set defaultValue(value: T) {
		this.assertNotDisposed();
		this.defaultCellValue = value;
	}

	public get disposed(): boolean {
		return this.isDisposed;
	}

	/**
	 * Stores `value` at (`row`, `column`), overwriting the stored value if the cell already exists.
	 * `value` must differ from the current default value.
	 */
	public add(row: number, column: number, value: T): void {
		this.assertPosition(row, column);
		assert(!this.areEqual(value, this.defaultCellValue), 'Cannot store a value equal to the default value.');

		let node: MatrixNode<T> | undefined = this.head;
		if (node === undefined) {
			debugInsert('inserting (%d;%d) into empty matrix', row, column);
			this.head = createNode(row, column, value);
			this.count++;
			return;
		}

		for (;;) {
			const order = comparePositions(row, column, node.cell.row, node.cell.column);
			if (order === 0) {
				debugInsert('updating (%d;%d)', row, column);
				node.cell.value = value;
				return;
			}
			if (order < 0) {
				this.spliceBefore(node, createNode(row, column, value));
				return;
			}
			if (node.next === undefined) {
				debugInsert('appending (%d;%d) at tail', row, column);
				const created = createNode(row, column, value);
				created.prev = node;
				node.next = created;
				this.count++;
				return;
			}
			node = node.next;
		}
	}

	public lookup(row: number, column: number): T {
		const node = this.findNode(row, column);
		return node === undefined ? this.defaultCellValue : node.cell.value;
	}

	public has(row: number, column: number): boolean {
		return this.findNode(row, column) !== undefined;
	}

	public *cells(): IterableIterator<MatrixCell<T>> {
		this.assertNotDisposed();
		for (let node = this.head; node !== undefined; node = node.next) {
			yield node.cell;
		}
	}

	public [Symbol.iterator](): IterableIterator<MatrixCell<T>> {
		return this.cells();
	}

	/**
	 * @returns a cursor at the first stored cell, or the end marker if nothing is stored.
	 */
	public begin(): MatrixCursor<T> {
		this.assertNotDisposed();
		return new MatrixCursor(this.head);
	}

	public end(): MatrixCursor<T> {
		return new MatrixCursor<T>(undefined);
	}

	public beginReadonly(): ReadonlyMatrixCursor<T> {
		this.assertNotDisposed();
		return new ReadonlyMatrixCursor(this.head);
	}

	public endReadonly(): ReadonlyMatrixCursor<T> {
		return new ReadonlyMatrixCursor<T>(undefined);
	}

	/**
	 * @returns an independent copy of this matrix, with the same options.
	 * Fails if a stored cell holds a value equal to the current default value, which can happen after the default
	 * value is changed.
	 */
	public clone(): SparseMatrix<T> {
		this.assertNotDisposed();
		return SparseMatrix.fromCells(this.rows, this.columns, this.defaultCellValue, this.cells(), {
			areEqual: this.areEqual,
			logger: this.logger,
		});
	}

	/**
	 * Replaces the contents of this matrix (dimensions included) with a copy of `other`.
	 * The copy is built before anything changes, so a failure leaves this matrix as it was.
	 * Cursors into this matrix are invalidated.
	 * @returns this matrix
	 */
	public assign(other: SparseMatrix<T>): this {
		this.assertNotDisposed();
		if (other === this) {
			return this;
		}

		const temporary = other.clone();
		this.swap(temporary);
		temporary.dispose();
		return this;
	}

	/**
	 * Compares two matrices by dimensions, default value, and stored cells.
	 */
	public equals(other: ReadonlySparseMatrix<T>, compareValues: (a: T, b: T) => boolean = Object.is): boolean {
		if (other === this) {
			return true;
		}

		return (
			this.rows === other.rowCount &&
			this.columns === other.columnCount &&
			this.count === other.size &&
			compareValues(this.defaultCellValue, other.defaultValue) &&
			compareIterables<ReadonlyMatrixCell<T>>(
				this.cells(),
				other.cells(),
				(a, b) => a.row === b.row && a.column === b.column && compareValues(a.value, b.value)
			)
		);
	}

	/**
	 * Releases every stored cell. Cursors into this matrix are invalidated.
	 */
	public dispose(): void {
		if (this.isDisposed) {
			return;
		}
		debugLifecycle('disposing %dx%d matrix', this.rows, this.columns);
		this.releaseChain();
		this.isDisposed = true;
	}

	private findNode(row: number, column: number): MatrixNode<T> | undefined {
		this.assertPosition(row, column);
		for (let node = this.head; node !== undefined; node = node.next) {
			const order = comparePositions(row, column, node.cell.row, node.cell.column);
			if (order === 0) {
				return node;
			}
			if (order < 0) {
				break;
			}
		}
		return undefined;
	}

	private spliceBefore(successor: MatrixNode<T>, created: MatrixNode<T>): void {
		const predecessor = successor.prev;
		created.prev = predecessor;
		created.next = successor;
		successor.prev = created;
		if (predecessor === undefined) {
			debugInsert('inserting (%d;%d) at head', created.cell.row, created.cell.column);
			this.head = created;
		} else {
			debugInsert('inserting (%d;%d) in the middle', created.cell.row, created.cell.column);
			predecessor.next = created;
		}
		this.count++;
	}

	private swap(other: SparseMatrix<T>): void {
		[this.head, other.head] = [other.head, this.head];
		[this.rows, other.rows] = [other.rows, this.rows];
		[this.columns, other.columns] = [other.columns, this.columns];
		[this.count, other.count] = [other.count, this.count];
		[this.defaultCellValue, other.defaultCellValue] = [other.defaultCellValue, this.defaultCellValue];
		[this.areEqual, other.areEqual] = [other.areEqual, this.areEqual];
	}

	// Iterative: chains can be far longer than the call stack is deep.
	private releaseChain(): void {
		let node: MatrixNode<T> | undefined = this.head;
		this.head = undefined;
		this.count = 0;
		while (node !== undefined) {
			const next: MatrixNode<T> | undefined = node.next;
			node.next = undefined;
			node.prev = undefined;
			node.released = true;
			node = next;
		}
	}

	private reportRollback(error: unknown): void {
		this.logger?.send({
			category: 'error',
			eventName: 'SparseMatrix:BuildRolledBack',
			rowCount: this.rows,
			columnCount: this.columns,
			size: this.count,
			message: error instanceof Error ? error.message : String(error),
		});
	}

	private assertPosition(row: number, column: number): void {
		this.assertNotDisposed();
		if (!isIntegerInRange(row, 1, this.rows)) {
			fail(`Row ${row} is outside of [1, ${this.rows}].`);
		}
		if (!isIntegerInRange(column, 1, this.columns)) {
			fail(`Column ${column} is outside of [1, ${this.columns}].`);
		}
	}

	private assertNotDisposed(): void {
		assert(!this.isDisposed, 'Cannot use a disposed matrix.');
	}
}
