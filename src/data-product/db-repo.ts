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

import { Pool, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { loggerFor } from '../logger';
import {
	DataProduct,
	DataProductChanges,
	NewDataProduct,
	SchemaNameAlreadyExistsError,
} from './data-product-entities';
import { DataProductRepository, isValidId, mergeChanges, nextUpdatedAt } from './data-product-repo';

const L = loggerFor(__filename);

export interface DataProductColumns {
	id: number;
	schema_name: string;
	description: string | null;
	owner: string;
	creation_date: Date;
	created_at: Date;
	updated_at: Date;
}

interface DataProductRow extends RowDataPacket, DataProductColumns {}

interface CountRow extends RowDataPacket {
	total: number | string;
}

// utf8mb4_bin keeps the unique index case sensitive, search lowercases both sides instead
const createTableQuery = `create table if not exists data_products (
	id int not null auto_increment primary key,
	schema_name varchar(255) character set utf8mb4 collate utf8mb4_bin not null,
	description varchar(1000) null,
	owner varchar(255) not null,
	creation_date datetime(3) not null,
	created_at datetime(3) not null,
	updated_at datetime(3) not null,
	unique key uq_data_products_schema_name (schema_name)
)`;

const columns = 'id, schema_name, description, owner, creation_date, created_at, updated_at';
const ordering = 'order by creation_date desc, id desc';

const selectAllQuery = `select ${columns} from data_products ${ordering}`;
const selectByIdQuery = `select ${columns} from data_products where id = ?`;
const lockByIdQuery = `select ${columns} from data_products where id = ? for update`;
const selectBySchemaNameQuery = `select ${columns} from data_products where schema_name = ?`;
const searchQuery = `select ${columns} from data_products where lower(schema_name) like ? escape '!' ${ordering}`;
const insertQuery =
	'insert into data_products (schema_name, description, owner, creation_date, created_at, updated_at) values (?, ?, ?, ?, ?, ?)';
const updateQuery =
	'update data_products set schema_name = ?, description = ?, owner = ?, creation_date = ?, updated_at = ? where id = ?';
const deleteQuery = 'delete from data_products where id = ?';
const countQuery = 'select count(*) as total from data_products';

export const toDataProduct = (row: DataProductColumns): DataProduct => ({
	id: Number(row.id),
	schemaName: row.schema_name,
	description: row.description,
	owner: row.owner,
	creationDate: new Date(row.creation_date),
	createdAt: new Date(row.created_at),
	updatedAt: new Date(row.updated_at),
});

/**
 * Builds a LIKE pattern matching term anywhere in the column, with the pattern
 * characters of term itself escaped by '!'.
 */
export const toContainsPattern = (term: string): string =>
	`%${term.toLowerCase().replace(/[!%_]/g, '!$&')}%`;

export const isDuplicateEntryError = (err: unknown): boolean =>
	err instanceof Error && 'code' in err && err.code === 'ER_DUP_ENTRY';

const rethrowDuplicate = (err: unknown, schemaName: string | undefined): never => {
	if (schemaName !== undefined && isDuplicateEntryError(err)) {
		L.info(`unique index rejected schema name '${schemaName}'`);
		throw new SchemaNameAlreadyExistsError(schemaName);
	}
	throw err;
};

// the part of a mysql2 pool this store relies on
export type DataProductPool = Pick<Pool, 'query' | 'getConnection'>;

/**
 * MySQL backed store. The pool is handed in by the caller, this module holds no connection state.
 */
export const createDbDataProductRepository = (pool: DataProductPool): DataProductRepository => {
	const findOne = async (query: string, value: number | string) => {
		const [rows] = await pool.query<DataProductRow[]>(query, [value]);
		return rows.length ? toDataProduct(rows[0]) : undefined;
	};

	return {
		async ensureSchema() {
			await pool.query(createTableQuery);
		},

		async getAll() {
			const [rows] = await pool.query<DataProductRow[]>(selectAllQuery);
			return rows.map(toDataProduct);
		},

		async getById(id) {
			if (!isValidId(id)) return undefined;
			return findOne(selectByIdQuery, id);
		},

		async getBySchemaName(schemaName) {
			if (!schemaName) return undefined;
			return findOne(selectBySchemaNameQuery, schemaName);
		},

		async searchBySchemaName(term) {
			const [rows] = await pool.query<DataProductRow[]>(searchQuery, [toContainsPattern(term)]);
			return rows.map(toDataProduct);
		},

		async insert(record: NewDataProduct) {
			const now = new Date();
			try {
				const [result] = await pool.query<ResultSetHeader>(insertQuery, [
					record.schemaName,
					record.description,
					record.owner,
					record.creationDate,
					now,
					now,
				]);
				return { ...record, id: result.insertId, createdAt: now, updatedAt: new Date(now) };
			} catch (err) {
				return rethrowDuplicate(err, record.schemaName);
			}
		},

		async applyUpdate(id: number, changes: DataProductChanges) {
			if (!isValidId(id)) return undefined;
			const connection = await pool.getConnection();
			try {
				await connection.beginTransaction();
				const [rows] = await connection.query<DataProductRow[]>(lockByIdQuery, [id]);
				if (!rows.length) {
					await connection.rollback();
					return undefined;
				}
				const existing = toDataProduct(rows[0]);
				const updated = mergeChanges(existing, changes, nextUpdatedAt(existing.updatedAt));
				await connection.query<ResultSetHeader>(updateQuery, [
					updated.schemaName,
					updated.description,
					updated.owner,
					updated.creationDate,
					updated.updatedAt,
					id,
				]);
				await connection.commit();
				return updated;
			} catch (err) {
				// a failed rollback must not replace the error that caused it
				await connection.rollback().catch((rollbackErr: unknown) => {
					L.error(`rollback of update to data product ${id} failed`, rollbackErr);
				});
				return rethrowDuplicate(err, changes.schemaName);
			} finally {
				connection.release();
			}
		},

		async delete(id) {
			if (!isValidId(id)) return false;
			const [result] = await pool.query<ResultSetHeader>(deleteQuery, [id]);
			return result.affectedRows > 0;
		},

		async count() {
			const [rows] = await pool.query<CountRow[]>(countQuery);
			return Number(rows[0].total);
		},
	};
};
