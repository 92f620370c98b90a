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

export interface RemoteSource {
	host: string;
	username: string;
	password: string;
}

export interface ClusterInfo {
	clusterName: string;
	version: string;
}

export interface ReindexSummary {
	took?: number;
	total?: number;
	created?: number;
	updated?: number;
	failures: number;
}

/**
 * Response bodies of the search cluster REST API, only the parts read here.
 */
export namespace ClusterResponses {
	export const CatIndices = zod.array(
		zod.object({
			index: zod.string().min(1),
			'docs.count': zod
				.string()
				.nullable()
				.optional(),
		}),
	);

	export const Count = zod.object({
		count: zod
			.number()
			.int()
			.nonnegative(),
	});

	export const Acknowledged = zod.object({
		acknowledged: zod.boolean(),
	});

	export const Root = zod.object({
		cluster_name: zod.string(),
		version: zod.object({ number: zod.string() }),
	});

	export const Reindex = zod.object({
		took: zod.number().optional(),
		total: zod.number().optional(),
		created: zod.number().optional(),
		updated: zod.number().optional(),
		failures: zod.array(zod.unknown()).default([]),
	});

	export const ErrorBody = zod.object({
		error: zod.union([
			zod.string(),
			zod.object({ type: zod.string().optional(), reason: zod.string().optional() }),
		]),
	});
}
