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

import _ from 'lodash';
import { z as zod, ZodError, ZodTypeAny } from 'zod';
import { loggerFor } from '../logger';
import { Errors } from '../utils';
import {
	DataProduct,
	DataProductChanges,
	DataProductCreateRequest,
	DataProductUpdateRequest,
	dataProductCreateSchema,
	dataProductUpdateSchema,
	SchemaNameAlreadyExistsError,
} from './data-product-entities';
import { DataProductRepository } from './data-product-repo';

const L = loggerFor(__filename);

/**
 * The calls a presentation layer (REST API, seeding script) makes against the catalog.
 *
 * Not found is never an error here: lookups and update resolve to undefined, delete to false.
 * A schema name collision rejects with SchemaNameAlreadyExistsError, invalid input with
 * Errors.InvalidArgument. Anything else comes from the store and is passed through as is.
 */
export interface DataProductService {
	listAll(): Promise<DataProduct[]>;
	findById(id: number | null | undefined): Promise<DataProduct | undefined>;
	findBySchemaName(schemaName: string | null | undefined): Promise<DataProduct | undefined>;
	create(request: DataProductCreateRequest): Promise<DataProduct>;
	update(
		id: number | null | undefined,
		request: DataProductUpdateRequest,
	): Promise<DataProduct | undefined>;
	delete(id: number | null | undefined): Promise<boolean>;
	searchBySchemaName(term: string | null | undefined): Promise<DataProduct[]>;
	count(): Promise<number>;
}

const describeIssues = (error: ZodError) =>
	error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');

const validate = <Schema extends ZodTypeAny>(
	schema: Schema,
	request: unknown,
): zod.infer<Schema> => {
	const result = schema.safeParse(request);
	if (!result.success) {
		throw new Errors.InvalidArgument(describeIssues(result.error));
	}
	return result.data;
};

export const createDataProductService = (
	repository: DataProductRepository,
): DataProductService => {
	const findBySchemaName = async (schemaName: string | null | undefined) => {
		if (!schemaName) return undefined;
		return repository.getBySchemaName(schemaName);
	};

	const listAll = () => repository.getAll();

	return {
		listAll,

		findBySchemaName,

		async findById(id) {
			if (id === null || id === undefined) return undefined;
			L.debug(`looking up data product ${id}`);
			return repository.getById(id);
		},

		async create(request) {
			const { creationDate, ...fields } = validate(dataProductCreateSchema, request);
			if (await findBySchemaName(fields.schemaName)) {
				L.info(`rejected duplicate schema name '${fields.schemaName}'`);
				throw new SchemaNameAlreadyExistsError(fields.schemaName);
			}
			const created = await repository.insert({
				...fields,
				creationDate: creationDate ?? new Date(),
			});
			L.info(`created data product ${created.id} '${created.schemaName}'`);
			return created;
		},

		async update(id, request) {
			if (id === null || id === undefined) return undefined;
			const changes: DataProductChanges = validate(dataProductUpdateSchema, request);

			const existing = await repository.getById(id);
			if (!existing) {
				L.debug(`data product ${id} not found for update`);
				return undefined;
			}

			// renaming a record to its own name is not a collision
			if (changes.schemaName !== undefined && changes.schemaName !== existing.schemaName) {
				const holder = await findBySchemaName(changes.schemaName);
				if (holder && holder.id !== existing.id) {
					L.info(`rejected rename of ${id} to taken schema name '${changes.schemaName}'`);
					throw new SchemaNameAlreadyExistsError(changes.schemaName);
				}
			}

			const updated = await repository.applyUpdate(id, changes);
			if (updated) {
				const fields = _.keys(_.omitBy(changes, _.isUndefined));
				L.info(`updated data product ${id} fields: ${fields.join(', ')}`);
			}
			return updated;
		},

		async delete(id) {
			if (id === null || id === undefined) return false;
			const deleted = await repository.delete(id);
			if (deleted) {
				L.info(`deleted data product ${id}`);
			}
			return deleted;
		},

		async searchBySchemaName(term) {
			const needle = _.trim(term ?? '');
			if (!needle) return listAll();
			return repository.searchBySchemaName(needle);
		},

		count: () => repository.count(),
	};
};
