/*
 * Copyright (c) 2020 The Ontario Institute for Cancer Research. All rights reserved
 *
 * This program and the accompanying materials are made available under the terms of
 * the GNU Affero General Public License v3.0. You should have received a copy of the
 * GNU Affero General Public License along with this program.
 *  If not, see <http://www.gnu.org/licenses/>.
 *
 * THIS SOFTWARE IS PROVIDED BY THE COPYRIGHT HOLDERS AND CONTRIBUTORS "AS IS" AND ANY
 * EXPRESS OR IMPLIED WARRANTIES, INCLUDING, BUT NOT LIMITED TO, THE IMPLIED WARRANTIES
 * OF MERCHANTABILITY AND FITNESS FOR A PARTICULAR PURPOSE ARE DISCLAIMED. IN NO EVENT
 * SHALL THE COPYRIGHT HOLDER OR CONTRIBUTORS BE LIABLE FOR ANY DIRECT, INDIRECT,
 * INCIDENTAL, SPECIAL, EXEMPLARY, OR CONSEQUENTIAL DAMAGES (INCLUDING, BUT NOT LIMITED
 * TO, PROCUREMENT OF SUBSTITUTE GOODS OR SERVICES; LOSS OF USE, DATA, OR PROFITS;
 * OR BUSINESS INTERRUPTION) HOWEVER CAUSED AND ON ANY THEORY OF LIABILITY, WHETHER
 * IN CONTRACT, STRICT LIABILITY, OR TORT (INCLUDING NEGLIGENCE OR OTHERWISE) ARISING IN
 * ANY WAY OUT OF THE USE OF THIS SOFTWARE, EVEN IF ADVISED OF THE POSSIBILITY OF SUCH DAMAGE.
 */

import chai from 'chai';
import sinon from 'sinon';
import { SchemaNameAlreadyExistsError } from '../../../src/data-product/data-product-entities';
import { DataProductRepository } from '../../../src/data-product/data-product-repo';
import {
	createDbDataProductRepository,
	DataProductColumns,
	isDuplicateEntryError,
	toContainsPattern,
	toDataProduct,
} from '../../../src/data-product/db-repo';
import { FIXED_NOW, rejectionOf } from './stubs';

const salesAnalyticsRow: DataProductColumns = {
	id: 7,
	schema_name: 'sales_analytics',
	description: 'Sales data analysis schema',
	owner: 'john.doe@company.com',
	creation_date: new Date('2024-01-01T00:00:00.000Z'),
	created_at: new Date('2024-02-01T00:00:00.000Z'),
	updated_at: new Date('2024-02-02T00:00:00.000Z'),
};

const duplicateEntry = () =>
	Object.assign(new Error("Duplicate entry 'marketing_metrics' for key 'uq'"), {
		code: 'ER_DUP_ENTRY',
	});

describe('db data product repository helpers', () => {
	describe('toContainsPattern', () => {
		it('wraps the lowercased term in wildcards', () => {
			chai.expect(toContainsPattern('SaLeS')).to.eq('%sales%');
		});

		it('escapes like pattern characters', () => {
			chai.expect(toContainsPattern('100%_done!')).to.eq('%100!%!_done!!%');
		});
	});

	describe('isDuplicateEntryError', () => {
		it('recognizes the mysql duplicate key error', () => {
			const err = Object.assign(new Error("Duplicate entry 'x' for key 'uq'"), {
				code: 'ER_DUP_ENTRY',
			});

			chai.expect(isDuplicateEntryError(err)).to.eq(true);
		});

		it('ignores other errors', () => {
			const err = Object.assign(new Error('connection lost'), { code: 'PROTOCOL_CONNECTION_LOST' });

			chai.expect(isDuplicateEntryError(err)).to.eq(false);
			chai.expect(isDuplicateEntryError(new Error('plain'))).to.eq(false);
			chai.expect(isDuplicateEntryError({ code: 'ER_DUP_ENTRY' })).to.eq(false);
		});
	});

	describe('toDataProduct', () => {
		it('maps snake case columns to a data product', () => {
			const row: DataProductColumns = {
				id: 7,
				schema_name: 'sales_analytics',
				description: null,
				owner: 'john.doe@company.com',
				creation_date: new Date('2024-01-01T00:00:00.000Z'),
				created_at: new Date('2024-02-01T00:00:00.000Z'),
				updated_at: new Date('2024-02-02T00:00:00.000Z'),
			};

			chai.expect(toDataProduct(row)).to.deep.eq({
				id: 7,
				schemaName: 'sales_analytics',
				description: null,
				owner: 'john.doe@company.com',
				creationDate: new Date('2024-01-01T00:00:00.000Z'),
				createdAt: new Date('2024-02-01T00:00:00.000Z'),
				updatedAt: new Date('2024-02-02T00:00:00.000Z'),
			});
		});
	});
});

describe('db data product repository', () => {
	const sandbox = sinon.createSandbox();
	let query: sinon.SinonStub;
	let connection: {
		beginTransaction: sinon.SinonStub;
		query: sinon.SinonStub;
		commit: sinon.SinonStub;
		rollback: sinon.SinonStub;
		release: sinon.SinonStub;
	};
	let repository: DataProductRepository;

	beforeEach(() => {
		sandbox.useFakeTimers({ now: FIXED_NOW, toFake: ['Date'] });
		query = sandbox.stub();
		connection = {
			beginTransaction: sandbox.stub().resolves(),
			query: sandbox.stub(),
			commit: sandbox.stub().resolves(),
			rollback: sandbox.stub().resolves(),
			release: sandbox.stub(),
		};
		const getConnection = sandbox.stub().resolves(connection);
		repository = createDbDataProductRepository({ query, getConnection });
	});

	afterEach(() => {
		sandbox.restore();
	});

	describe('reads', () => {
		it('maps every row, most recent creation date first', async () => {
			query.resolves([[salesAnalyticsRow], []]);

			const all = await repository.getAll();

			chai.expect(all).to.deep.eq([toDataProduct(salesAnalyticsRow)]);
			chai.expect(query.firstCall.args[0]).to.match(/order by creation_date desc, id desc$/);
		});

		it('returns undefined when no row matches the id', async () => {
			query.resolves([[], []]);

			chai.expect(await repository.getById(42)).to.eq(undefined);
			chai.expect(query.firstCall.args[1]).to.deep.eq([42]);
		});

		it('does not query for an invalid id', async () => {
			chai.expect(await repository.getById(0)).to.eq(undefined);
			chai.expect(await repository.getById(null)).to.eq(undefined);
			chai.expect(query.called).to.eq(false);
		});

		it('searches with an escaped, lowercased pattern', async () => {
			query.resolves([[salesAnalyticsRow], []]);

			const found = await repository.searchBySchemaName('Sales_');

			chai.expect(found.map((product) => product.id)).to.deep.eq([7]);
			chai.expect(query.firstCall.args[1]).to.deep.eq(['%sales!_%']);
		});

		it('parses the count the driver returns as a string', async () => {
			query.resolves([[{ total: '3' }], []]);

			chai.expect(await repository.count()).to.eq(3);
		});
	});

	describe('insert', () => {
		const record = {
			schemaName: 'marketing_metrics',
			description: null,
			owner: 'bob@company.com',
			creationDate: new Date('2024-01-02T00:00:00.000Z'),
		};

		it('returns the record with the generated id and stamps', async () => {
			query.resolves([{ insertId: 12, affectedRows: 1 }, undefined]);

			const inserted = await repository.insert(record);

			chai.expect(inserted).to.deep.eq({
				...record,
				id: 12,
				createdAt: FIXED_NOW,
				updatedAt: FIXED_NOW,
			});
			chai
				.expect(query.firstCall.args[1])
				.to.deep.eq([
					'marketing_metrics',
					null,
					'bob@company.com',
					record.creationDate,
					FIXED_NOW,
					FIXED_NOW,
				]);
		});

		it('reports a unique index violation as a taken schema name', async () => {
			query.rejects(duplicateEntry());

			const error = await rejectionOf(repository.insert(record));

			chai.expect(error).to.be.instanceOf(SchemaNameAlreadyExistsError);
			chai.expect(error).to.have.property('schemaName', 'marketing_metrics');
		});

		it('lets other storage errors through unchanged', async () => {
			const lost = new Error('connection lost');
			query.rejects(lost);

			chai.expect(await rejectionOf(repository.insert(record))).to.eq(lost);
		});
	});

	describe('applyUpdate', () => {
		it('updates the locked row in one transaction', async () => {
			connection.query.onFirstCall().resolves([[salesAnalyticsRow], []]);
			connection.query.onSecondCall().resolves([{ affectedRows: 1 }, undefined]);

			const updated = await repository.applyUpdate(7, { owner: 'jane.doe@company.com' });

			chai.expect(updated).to.deep.eq({
				...toDataProduct(salesAnalyticsRow),
				owner: 'jane.doe@company.com',
				updatedAt: FIXED_NOW,
			});
			chai.expect(connection.query.firstCall.args[0]).to.match(/for update$/);
			chai
				.expect(connection.query.secondCall.args[1])
				.to.deep.eq([
					'sales_analytics',
					'Sales data analysis schema',
					'jane.doe@company.com',
					salesAnalyticsRow.creation_date,
					FIXED_NOW,
					7,
				]);
			chai.expect(connection.beginTransaction.calledOnce).to.eq(true);
			chai.expect(connection.commit.calledOnce).to.eq(true);
			chai.expect(connection.rollback.called).to.eq(false);
			chai.expect(connection.release.calledOnce).to.eq(true);
		});

		it('returns undefined and rolls back when the row is gone', async () => {
			connection.query.resolves([[], []]);

			const updated = await repository.applyUpdate(7, { owner: 'jane.doe@company.com' });

			chai.expect(updated).to.eq(undefined);
			chai.expect(connection.query.calledOnce).to.eq(true);
			chai.expect(connection.rollback.calledOnce).to.eq(true);
			chai.expect(connection.commit.called).to.eq(false);
			chai.expect(connection.release.calledOnce).to.eq(true);
		});

		it('reports a rename onto a taken name as a taken schema name', async () => {
			connection.query.onFirstCall().resolves([[salesAnalyticsRow], []]);
			connection.query.onSecondCall().rejects(duplicateEntry());

			const error = await rejectionOf(
				repository.applyUpdate(7, { schemaName: 'marketing_metrics' }),
			);

			chai.expect(error).to.be.instanceOf(SchemaNameAlreadyExistsError);
			chai.expect(error).to.have.property('schemaName', 'marketing_metrics');
			chai.expect(connection.rollback.calledOnce).to.eq(true);
			chai.expect(connection.commit.called).to.eq(false);
			chai.expect(connection.release.calledOnce).to.eq(true);
		});

		it('keeps the original error when the rollback fails too', async () => {
			const lost = new Error('connection lost');
			connection.query.onFirstCall().resolves([[salesAnalyticsRow], []]);
			connection.query.onSecondCall().rejects(lost);
			connection.rollback.rejects(new Error('rollback failed'));

			const error = await rejectionOf(
				repository.applyUpdate(7, { owner: 'jane.doe@company.com' }),
			);

			chai.expect(error).to.eq(lost);
			chai.expect(connection.release.calledOnce).to.eq(true);
		});

		it('does not open a connection for an invalid id', async () => {
			chai.expect(await repository.applyUpdate(-1, { owner: 'x' })).to.eq(undefined);
			chai.expect(connection.beginTransaction.called).to.eq(false);
		});
	});

	describe('delete', () => {
		it('reports whether a row was removed', async () => {
			query.onFirstCall().resolves([{ affectedRows: 1 }, undefined]);
			query.onSecondCall().resolves([{ affectedRows: 0 }, undefined]);

			chai.expect(await repository.delete(7)).to.eq(true);
			chai.expect(await repository.delete(7)).to.eq(false);
		});

		it('returns false for a missing id without querying', async () => {
			chai.expect(await repository.delete(undefined)).to.eq(false);
			chai.expect(query.called).to.eq(false);
		});
	});
});
