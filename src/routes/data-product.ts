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

import * as express from 'express';
import { DataProductController } from '../data-product/data-product-api';
import { DataProductService } from '../data-product/data-product-service';
import { wrapAsync } from '../middleware';

export const createDataProductRouter = (service: DataProductService) => {
	const controller = new DataProductController(service);
	const router = express.Router();

	// GET
	router.get('/', wrapAsync(controller.listDataProducts));
	// registered before /:id so "count" is not read as an id
	router.get('/count', wrapAsync(controller.countDataProducts));
	router.get('/:id', wrapAsync(controller.getDataProduct));

	// POST
	router.post('/', wrapAsync(controller.createDataProduct));

	// PATCH
	router.patch('/:id', wrapAsync(controller.updateDataProduct));

	// DELETE
	router.delete('/:id', wrapAsync(controller.deleteDataProduct));

	return router;
};
