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
import chaiHttp from 'chai-http';
import express, { NextFunction, Request, Response } from 'express';
import { errorHandler, wrapAsync } from '../../src/middleware';
import { Errors } from '../../src/utils';

chai.use(chaiHttp);

describe('middleware', () => {
	describe('errorHandler', () => {
		let passedOn: Error[];
		let app: express.Express;

		beforeEach(() => {
			passedOn = [];
			app = express();
			app.get(
				'/conflict',
				wrapAsync(async () => {
					throw new Errors.StateConflict('already taken');
				}),
			);
			app.get(
				'/missing',
				wrapAsync(async () => {
					throw new Errors.NotFound('nothing here');
				}),
			);
			app.get('/partial', (req, res, next) => {
				res.status(200).write('partial');
				next(new Error('failed mid response'));
			});
			app.use(errorHandler);
			app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
				passedOn.push(err);
				res.end();
			});
		});

		it('maps a state conflict to 409', async () => {
			const res = await chai.request(app).get('/conflict');

			chai.expect(res.status).to.eq(409);
			chai.expect(res.body).to.deep.eq({ error: 'StateConflict', message: 'already taken' });
			chai.expect(passedOn).to.have.length(0);
		});

		it('maps a missing entity to 404', async () => {
			const res = await chai.request(app).get('/missing');

			chai.expect(res.status).to.eq(404);
			chai.expect(res.body).to.deep.eq({ error: 'NotFound', message: 'nothing here' });
		});

		it('passes the error on once the response has started', async () => {
			const res = await chai.request(app).get('/partial');

			chai.expect(res.status).to.eq(200);
			chai.expect(res.text).to.eq('partial');
			chai.expect(passedOn).to.have.length(1);
			chai.expect(passedOn[0]).to.have.property('message', 'failed mid response');
		});
	});
});
