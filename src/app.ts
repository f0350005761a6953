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

import bodyParser from 'body-parser';
import express from 'express';
import morgan from 'morgan';
import path from 'path';
import responseTime from 'response-time';
import * as swaggerUi from 'swagger-ui-express';
import yaml from 'yamljs';

import { getHealth, Status } from './app-health';
import { DataProductService } from './data-product/data-product-service';
import * as middleware from './middleware';
import { createDataProductRouter } from './routes/data-product';

export const createApp = (dataProductService: DataProductService) => {
	const app = express();

	app.use(bodyParser.json());
	app.use(
		morgan('dev', {
			// skip those since they get alot of traffic from monitoring
			skip: (req) => req.url == '/health' || process.env.NODE_ENV === 'test',
		}),
	);
	app.use(responseTime());

	/** App Custom Endpoints
	 * - Health
	 * - Swagger Docs
	 */
	app.get('/health', (req, res) => {
		const health = getHealth();
		const resBody = {
			version: process.env.DATA_CATALOG_VERSION || 'dev',
			health,
		};
		if (health.all.status == Status.OK) {
			return res.status(200).send(resBody);
		}
		return res.status(500).send(resBody);
	});
	app.use(
		'/api-docs',
		swaggerUi.serve,
		swaggerUi.setup(yaml.load(path.join(__dirname, './resources/swagger.yaml'))),
	);

	/** Attach Routers */
	app.use('/data-products', createDataProductRouter(dataProductService));

	// this has to be defined after all routes for it to work,
	// errors arriving after the response started fall through to express' final handler
	app.use(middleware.errorHandler);

	return app;
};
