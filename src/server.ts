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

console.time('boot time');
// Has to import config before any other import uses the configurations
import { AppConfig, config, DbConfig, StoreType } from './config';
import dotenv from 'dotenv';
if (process.env.NODE_ENV !== 'PRODUCTION') {
	dotenv.config();
}
import * as bootstrap from './bootstrap';
import { createApp } from './app';

const parseStoreType = (value: string | undefined): StoreType =>
	value === 'memory' ? 'memory' : 'mysql';

const defaultAppConfigImpl: AppConfig = {
	port(): number {
		return Number(process.env.PORT) || 3000;
	},
	storeType(): StoreType {
		return parseStoreType(process.env.DATA_PRODUCT_STORE);
	},
	seedSampleData(): boolean {
		return process.env.SEED_SAMPLE_DATA === 'true';
	},
	dbProperties(): DbConfig {
		return {
			database: process.env.DB_NAME || 'data_catalog',
			host: process.env.DB_HOST || 'localhost',
			password: process.env.DB_PASSWORD || '',
			user: process.env.DB_USER || 'catalog',
			port: Number(process.env.DB_PORT) || 3306,
			timeout: Number(process.env.DB_TIMEOUT_MILLIS) || 5 * 1000,
		};
	},
};

(async () => {
	const dataProductService = await bootstrap.run(defaultAppConfigImpl);
	const app = createApp(dataProductService);
	const port = config.getConfig().port();

	app.listen(port, () => {
		console.log(' App is running at http://localhost:%d in %s mode', port, app.get('env'));
		console.debug(`Swagger Docs available at http://localhost:${port}/api-docs`);
		console.log('  Press CTRL-C to stop\n');
		console.timeEnd('boot time');
	});
})().catch((err) => {
	console.error('failed to start', err);
	process.exit(1);
});
