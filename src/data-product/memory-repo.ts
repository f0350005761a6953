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
import { DataProduct, SchemaNameAlreadyExistsError } from './data-product-entities';
import {
	byCreationDateDesc,
	DataProductRepository,
	isValidId,
	mergeChanges,
	nextUpdatedAt,
} from './data-product-repo';

/**
 * In process store used for local development and tests. Records are copied on the way in
 * and out so callers never hold a reference to stored state. The unique index on schema
 * name is enforced the same way the database enforces it.
 */
export const createMemoryDataProductRepository = (): DataProductRepository => {
	const records = new Map<number, DataProduct>();
	let lastId = 0;

	const sorted = (values: DataProduct[]) => values.sort(byCreationDateDesc).map(_.cloneDeep);

	const assertUnique = (schemaName: string, ownId?: number) => {
		for (const record of records.values()) {
			if (record.schemaName === schemaName && record.id !== ownId) {
				throw new SchemaNameAlreadyExistsError(schemaName);
			}
		}
	};

	return {
		async ensureSchema() {},

		async getAll() {
			return sorted([...records.values()]);
		},

		async getById(id) {
			if (!isValidId(id)) return undefined;
			const record = records.get(id);
			return record && _.cloneDeep(record);
		},

		async getBySchemaName(schemaName) {
			if (!schemaName) return undefined;
			const record = [...records.values()].find((r) => r.schemaName === schemaName);
			return record && _.cloneDeep(record);
		},

		async searchBySchemaName(term) {
			const needle = term.toLowerCase();
			const matches = [...records.values()].filter((r) =>
				r.schemaName.toLowerCase().includes(needle),
			);
			return sorted(matches);
		},

		async insert(record) {
			assertUnique(record.schemaName);
			const now = new Date();
			const stored: DataProduct = {
				id: ++lastId,
				schemaName: record.schemaName,
				description: record.description,
				owner: record.owner,
				creationDate: new Date(record.creationDate),
				createdAt: now,
				updatedAt: new Date(now),
			};
			records.set(stored.id, stored);
			return _.cloneDeep(stored);
		},

		async applyUpdate(id, changes) {
			if (!isValidId(id)) return undefined;
			const existing = records.get(id);
			if (!existing) return undefined;
			if (changes.schemaName !== undefined) {
				assertUnique(changes.schemaName, id);
			}
			const updatedAt = nextUpdatedAt(existing.updatedAt);
			const updated = _.cloneDeep(mergeChanges(existing, changes, updatedAt));
			records.set(id, updated);
			return _.cloneDeep(updated);
		},

		async delete(id) {
			if (!isValidId(id)) return false;
			return records.delete(id);
		},

		async count() {
			return records.size;
		},
	};
};
