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

import { z as zod } from 'zod';
import { Errors } from '../utils';

export const SCHEMA_NAME_MAX_LENGTH = 255;
export const DESCRIPTION_MAX_LENGTH = 1000;
export const OWNER_MAX_LENGTH = 255;

/**
 * A catalog entry describing one data product (a schema registered by a team).
 * createdAt and updatedAt are managed by the repository, never by callers.
 */
export interface DataProduct {
	id: number;
	schemaName: string;
	description: string | null;
	owner: string;
	creationDate: Date;
	createdAt: Date;
	updatedAt: Date;
}

// what the repository needs to persist a new record, every caller supplied field resolved
export type NewDataProduct = Pick<
	DataProduct,
	'schemaName' | 'description' | 'owner' | 'creationDate'
>;

// fields an update may touch; a key that is absent is left unchanged
export type DataProductChanges = Partial<NewDataProduct>;

const schemaName = zod.string().trim().min(1).max(SCHEMA_NAME_MAX_LENGTH);
const owner = zod.string().trim().min(1).max(OWNER_MAX_LENGTH);
const description = zod.string().trim().max(DESCRIPTION_MAX_LENGTH).nullish();
// null means "not given": a missing creation date defaults on create and is left alone on update
const creationDate = zod.coerce
	.date()
	.nullish()
	.transform((value) => value ?? undefined);

export const dataProductCreateSchema = zod.object({
	schemaName,
	// blank descriptions are stored as null
	description: description.transform((value) => value || null),
	owner,
	creationDate,
});

export const dataProductUpdateSchema = zod.object({
	schemaName: schemaName.optional(),
	description: description.transform((value) => (value === undefined ? undefined : value || null)),
	owner: owner.optional(),
	creationDate,
});

export type DataProductCreateRequest = zod.input<typeof dataProductCreateSchema>;
export type DataProductUpdateRequest = zod.input<typeof dataProductUpdateSchema>;

export class SchemaNameAlreadyExistsError extends Errors.StateConflict {
	constructor(readonly schemaName: string) {
		super(`Data product with schema name '${schemaName}' already exists`);
		this.name = this.constructor.name;
	}
}
