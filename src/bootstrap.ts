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

import { Pool } from 'mysql2/promise';
import { setStatus, Status } from './app-health';
import { AppConfig, initConfigs } from './config';
import { createDataProductService, DataProductService } from './data-product/data-product-service';
import { DataProductRepository } from './data-product/data-product-repo';
import { createDbDataProductRepository } from './data-product/db-repo';
import { createMemoryDataProductRepository } from './data-product/memory-repo';
import { seedSampleData } from './data-product/seed';
import { createPool, ping } from './db/pool';
import { loggerFor } from './logger';

const L = loggerFor(__filename);

const DB_PING_INTERVAL_MILLIS = 5 * 60 * 1000;

async function pingDb(pool: Pool) {
	try {
		await ping(pool);
		setStatus('db', { status: Status.OK });
	} catch (err) {
		L.error('cannot get connection to the database', err);
		setStatus('db', { status: Status.ERROR, info: { error: String(err) } });
	}
}

const setupDbRepository = async (config: AppConfig): Promise<DataProductRepository> => {
	const pool = createPool(config.dbProperties());
	pool.on('connection', () => setStatus('db', { status: Status.OK }));

	await pingDb(pool);
	// check the connection every 5 minutes
	setInterval(() => {
		pingDb(pool).catch((err) => L.error('db health check failed', err));
	}, DB_PING_INTERVAL_MILLIS).unref();

	return createDbDataProductRepository(pool);
};

const setupRepository = async (config: AppConfig): Promise<DataProductRepository> => {
	if (config.storeType() === 'memory') {
		L.warn('using in memory data product store, records are lost on restart');
		setStatus('db', { status: Status.OK });
		return createMemoryDataProductRepository();
	}
	return setupDbRepository(config);
};

export const run = async (config: AppConfig): Promise<DataProductService> => {
	initConfigs(config);

	const repository = await setupRepository(config);
	await repository.ensureSchema();
	L.info('data product store ready');

	const service = createDataProductService(repository);
	if (config.seedSampleData()) {
		await seedSampleData(service);
	}
	return service;
};
