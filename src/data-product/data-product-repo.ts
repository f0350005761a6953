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

import { DataProduct, DataProductChanges, NewDataProduct } from './data-product-entities';

/**
 * Durable storage of data product records. Every operation is its own unit of work
 * against the backing store, nothing is cached between calls.
 *
 * Lookups resolve to undefined when nothing matches; an id that is null, undefined or
 * not a positive integer never matches.
 *
 * insert and applyUpdate raise SchemaNameAlreadyExistsError when the store's unique
 * index on schema name rejects the write.
 */
export interface DataProductRepository {
	ensureSchema(): Promise<void>;
	getAll(): Promise<DataProduct[]>;
	getById(id: number | null | undefined): Promise<DataProduct | undefined>;
	getBySchemaName(schemaName: string): Promise<DataProduct | undefined>;
	/**
	 * Case insensitive substring match on schema name, ordered like getAll.
	 * Wildcard characters in the term match literally.
	 */
	searchBySchemaName(term: string): Promise<DataProduct[]>;
	insert(record: NewDataProduct): Promise<DataProduct>;
	applyUpdate(id: number, changes: DataProductChanges): Promise<DataProduct | undefined>;
	delete(id: number | null | undefined): Promise<boolean>;
	count(): Promise<number>;
}

export const isValidId = (id: number | null | undefined): id is number =>
	typeof id === 'number' && Number.isInteger(id) && id > 0;

/**
 * updatedAt must move forward on every update, even when two writes land in the same millisecond.
 */
export const nextUpdatedAt = (previous: Date, now: Date = new Date()): Date =>
	now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);

// most recent creationDate first, newest id first on ties
export const byCreationDateDesc = (a: DataProduct, b: DataProduct): number =>
	b.creationDate.getTime() - a.creationDate.getTime() || b.id - a.id;

/**
 * Copies only the fields present in changes onto the existing record.
 * A null description is a value (it clears the field), undefined means untouched.
 */
export const mergeChanges = (
	existing: DataProduct,
	changes: DataProductChanges,
	updatedAt: Date,
): DataProduct => ({
	...existing,
	schemaName: changes.schemaName ?? existing.schemaName,
	description: changes.description !== undefined ? changes.description : existing.description,
	owner: changes.owner ?? existing.owner,
	creationDate: changes.creationDate ?? existing.creationDate,
	updatedAt,
});
