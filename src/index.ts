/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

/**
 * A generic, fixed-size sparse matrix.
 *
 * @packageDocumentation
 */

/**
 * This file represents the public API. Consumers of this package will not see exported modules unless they are enumerated here.
 * Removing / editing existing exports here will often indicate a breaking change, so please be cognizant of changes made here.
 */

export { SparseMatrix } from './SparseMatrix';
export type { ReadonlySparseMatrix, SparseMatrixOptions } from './SparseMatrix';
export type { MatrixCell, ReadonlyMatrixCell } from './MatrixNode';
export { MatrixCursor, ReadonlyMatrixCursor } from './MatrixCursor';
export { convertSparseMatrix, Conversions } from './Conversion';
export type { Converter } from './Conversion';
export { evaluate, Predicates } from './Evaluate';
export type { Predicate } from './Evaluate';
export { describeSparseMatrix } from './Debug';
export { sparseMatrixAssertionErrorType, isSparseMatrixAssertionError } from './Common';
