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

import fs from 'fs';
import path from 'path';
import { z as zod } from 'zod';
import { loggerFor } from '../logger';
import { DataProductService } from './data-product-service';

const L = loggerFor(__filename);

const DAY_MILLIS = 24 * 60 * 60 * 1000;

const sampleSchema = zod
	.object({
		schemaName: zod.string(),
		description: zod.string().nullish(),
		owner: zod.string(),
		daysAgo: zod.number().nonnegative(),
	})
	.array();

export type SampleDataProduct = zod.infer<typeof sampleSchema>[number];

export const loadSampleData = (
	file: string = path.join(__dirname, '../resources/sample-data-products.json'),
): SampleDataProduct[] => sampleSchema.parse(JSON.parse(fs.readFileSync(file, 'utf-8')));

/**
 * Fills an empty catalog with demo records, each dated `daysAgo` days before now.
 * A catalog that already holds records is left alone. A sample that fails to save is
 * logged and skipped so the rest still go in.
 *
 * @returns how many samples were created
 */
export const seedSampleData = async (
	service: DataProductService,
	samples: SampleDataProduct[] = loadSampleData(),
	now: Date = new Date(),
): Promise<number> => {
	if ((await service.count()) > 0) {
		L.info('catalog already contains data products, skipping seed');
		return 0;
	}

	let created = 0;
	for (const { daysAgo, ...sample } of samples) {
		try {
			await service.create({
				...sample,
				creationDate: new Date(now.getTime() - daysAgo * DAY_MILLIS),
			});
			created++;
			L.info(`created sample data product: ${sample.schemaName}`);
		} catch (err) {
			L.error(`failed to create sample data product ${sample.schemaName}`, err);
		}
	}
	L.info(`seeded ${created} of ${samples.length} sample data products`);
	return created;
};
