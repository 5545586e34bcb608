/*!
 * Copyright (c) Microsoft Corporation. All rights reserved.
 * Licensed under the MIT License.
 */

import { expect } from 'chai';
import { describeSparseMatrix } from '../Debug';
import { SparseMatrix } from '../SparseMatrix';
import { buildScenarioMatrix } from './utilities/TestUtilities';

describe('describeSparseMatrix', () => {
	it('lists stored values in order', () => {
		expect(describeSparseMatrix(buildScenarioMatrix())).to.equal(
			['size: 6', 'rows: 3', 'columns: 2', 'default value: 999', '| 3 | 2 | 3 | 5 | 5 | 6 |'].join('\n')
		);
	});

	it('describes an empty matrix', () => {
		expect(describeSparseMatrix(new SparseMatrix(1, 4, 'x'))).to.equal(
			['size: 0', 'rows: 1', 'columns: 4', 'default value: x', '|'].join('\n')
		);
	});

	it('formats values with the supplied function', () => {
		const matrix = new SparseMatrix(1, 2, 0);
		matrix.add(1, 2, 0.5);
		expect(describeSparseMatrix(matrix, (value) => value.toFixed(2))).to.equal(
			['size: 1', 'rows: 1', 'columns: 2', 'default value: 0.00', '| 0.50 |'].join('\n')
		);
	});
});
