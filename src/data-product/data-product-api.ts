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

import { Request, Response } from 'express';
import { z as zod } from 'zod';
import { ControllerUtils } from '../utils';
import { dataProductCreateSchema, dataProductUpdateSchema } from './data-product-entities';
import { DataProductService } from './data-product-service';

const idParam = zod.coerce.number().int().positive();
const listQuery = zod.object({ search: zod.string().optional() });

const parseId = (req: Request) => idParam.safeParse(req.params.id);

export class DataProductController {
	constructor(private readonly service: DataProductService) {}

	listDataProducts = async (req: Request, res: Response) => {
		const query = listQuery.safeParse(req.query);
		if (!query.success) {
			return ControllerUtils.badRequest(res, 'search must be a single value', query.error.issues);
		}
		const { search } = query.data;
		const dataProducts =
			search === undefined
				? await this.service.listAll()
				: await this.service.searchBySchemaName(search);
		return res.status(200).send(dataProducts);
	};

	countDataProducts = async (req: Request, res: Response) => {
		const count = await this.service.count();
		return res.status(200).send({ count });
	};

	getDataProduct = async (req: Request, res: Response) => {
		const id = parseId(req);
		if (!id.success) {
			return ControllerUtils.badRequest(res, `Invalid data product id: ${req.params.id}`);
		}
		const dataProduct = await this.service.findById(id.data);
		if (!dataProduct) {
			return ControllerUtils.notFound(res, `Data product ${id.data} not found`);
		}
		return res.status(200).send(dataProduct);
	};

	createDataProduct = async (req: Request, res: Response) => {
		const body = dataProductCreateSchema.safeParse(req.body);
		if (!body.success) {
			return ControllerUtils.badRequest(res, 'Invalid data product', body.error.issues);
		}
		// a taken schema name surfaces through the error handler as 409
		const created = await this.service.create(body.data);
		return res.status(201).send(created);
	};

	updateDataProduct = async (req: Request, res: Response) => {
		const id = parseId(req);
		if (!id.success) {
			return ControllerUtils.badRequest(res, `Invalid data product id: ${req.params.id}`);
		}
		const body = dataProductUpdateSchema.safeParse(req.body);
		if (!body.success) {
			return ControllerUtils.badRequest(res, 'Invalid data product changes', body.error.issues);
		}
		const updated = await this.service.update(id.data, body.data);
		if (!updated) {
			return ControllerUtils.notFound(res, `Data product ${id.data} not found`);
		}
		return res.status(200).send(updated);
	};

	deleteDataProduct = async (req: Request, res: Response) => {
		const id = parseId(req);
		if (!id.success) {
			return ControllerUtils.badRequest(res, `Invalid data product id: ${req.params.id}`);
		}
		const deleted = await this.service.delete(id.data);
		if (!deleted) {
			return ControllerUtils.notFound(res, `Data product ${id.data} not found`);
		}
		return res.status(204).send();
	};
}
