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

import { NextFunction, Request, RequestHandler, Response } from 'express';
import { loggerFor } from './logger';
import { Errors } from './utils';

const L = loggerFor(__filename);

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

// wrapper to handle errors from async express route handlers
export const wrapAsync = (fn: AsyncRequestHandler): RequestHandler => {
	return (req, res, next) => {
		fn(req, res, next).catch(next);
	};
};

// general catch all error handler
export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction) => {
	L.error('error handler received error: ', err);
	if (res.headersSent) {
		L.debug('error handler skipped');
		return next(err);
	}
	let status: number;
	let name = err.name;
	let customizableMsg = err.message;
	switch (true) {
		case err instanceof Errors.InvalidArgument:
			status = 400;
			break;
		// malformed json bodies rejected by body-parser
		case err instanceof SyntaxError:
			status = 400;
			name = 'InvalidArgument';
			customizableMsg = 'Request body is not valid JSON';
			break;
		case err instanceof Errors.NotFound:
			status = 404;
			break;
		case err instanceof Errors.StateConflict:
			status = 409;
			break;
		default:
			status = 500;
			name = 'InternalServerError';
			customizableMsg = 'Something went wrong, please try again later';
	}
	res.status(status).send({ error: name, message: customizableMsg });
};
