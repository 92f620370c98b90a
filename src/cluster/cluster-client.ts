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

import https from 'https';
import fetch, { RequestInit, Response } from 'node-fetch';
import * as promiseTools from 'promise-tools';
import { z as zod } from 'zod';
import { ClusterConfig, ClusterRole, clusterUrl, HttpConfig } from '../config';
import { loggerFor } from '../logger';
import { toErrorMessage } from '../utils';
import { AsyncResult, failure, Result, success } from '../utils/results';
import { ClusterInfo, ClusterResponses, RemoteSource, ReindexSummary } from './cluster-entities';
const L = loggerFor(__filename);

export type HttpFetch = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * The operations this tool needs from a search cluster. Every call resolves to a Result,
 * request errors and unexpected replies are never thrown.
 */
export interface ClusterClient {
	readonly role: ClusterRole;
	readonly url: string;
	ping(): AsyncResult<ClusterInfo>;
	listIndices(pattern: string): AsyncResult<string[]>;
	countDocuments(index: string): AsyncResult<number>;
	blockWrites(index: string): AsyncResult<void>;
	reindexFromRemote(remote: RemoteSource, index: string): AsyncResult<ReindexSummary>;
	flush(index: string): AsyncResult<void>;
	deleteIndex(index: string): AsyncResult<void>;
	closeIndex(index: string): AsyncResult<void>;
}

export interface ClusterPair {
	source: ClusterClient;
	destination: ClusterClient;
}

type Method = 'GET' | 'POST' | 'PUT' | 'DELETE';

interface RequestOptions {
	body?: object;
	// only reads are retried, a repeated write could run twice on the cluster
	retry?: boolean;
	timeoutMs?: number;
}

class ClusterRequestError extends Error {
	constructor(msg: string) {
		super(msg);
	}
}

const authorizationHeader = (cluster: ClusterConfig): Record<string, string> => {
	if (!cluster.username) {
		return {};
	}
	const token = Buffer.from(`${cluster.username}:${cluster.password}`).toString('base64');
	return { Authorization: `Basic ${token}` };
};

const describeErrorBody = (status: number, body: unknown) => {
	const parsed = ClusterResponses.ErrorBody.safeParse(body);
	if (!parsed.success) {
		return `status ${status}`;
	}
	const error = parsed.data.error;
	if (typeof error === 'string') {
		return `status ${status}: ${error}`;
	}
	return `status ${status}: ${error.type || 'error'} ${error.reason || ''}`.trim();
};

const parseWith = <S extends zod.ZodTypeAny>(schema: S, body: unknown): Result<zod.infer<S>> => {
	const parsed = schema.safeParse(body);
	if (!parsed.success) {
		return failure('unexpected response body', { issues: parsed.error.issues });
	}
	return success(parsed.data);
};

const acknowledged = (operation: string, index: string, body: unknown): Result<void> => {
	const parsed = parseWith(ClusterResponses.Acknowledged, body);
	if (!parsed.success) {
		return parsed;
	}
	if (!parsed.data.acknowledged) {
		return failure(`${operation} of ${index} was not acknowledged`);
	}
	return success(undefined);
};

export const createClusterClient = (
	cluster: ClusterConfig,
	http: HttpConfig,
	doFetch: HttpFetch = fetch,
): ClusterClient => {
	const baseUrl = clusterUrl(cluster);
	const agent =
		cluster.protocol === 'https'
			? new https.Agent({ rejectUnauthorized: http.rejectUnauthorized })
			: undefined;

	const send = async (method: Method, path: string, options: RequestOptions): Promise<Response> => {
		const url = `${baseUrl}${path}`;
		const call = async () => {
			L.debug(`${cluster.name}: ${method} ${path}`);
			let response: Response;
			try {
				response = await doFetch(url, {
					method,
					agent,
					headers: {
						'Content-Type': 'application/json',
						...authorizationHeader(cluster),
					},
					body: options.body ? JSON.stringify(options.body) : undefined,
				});
			} catch (err) {
				throw new ClusterRequestError(`${method} ${url} failed: ${toErrorMessage(err)}`);
			}
			if (response.status >= 500) {
				throw new ClusterRequestError(`${method} ${url} failed with status ${response.status}`);
			}
			return response;
		};
		const timed = () => {
			const timeoutMs = options.timeoutMs ?? http.requestTimeoutMs;
			return timeoutMs > 0 ? promiseTools.timeout(call(), timeoutMs) : call();
		};
		if (!options.retry) {
			return await timed();
		}
		return await promiseTools.retry(
			{ times: http.requestRetries, interval: http.requestRetryIntervalMs },
			timed,
		);
	};

	const request = async (
		method: Method,
		path: string,
		options: RequestOptions = {},
	): AsyncResult<unknown> => {
		let response: Response;
		try {
			response = await send(method, path, options);
		} catch (err) {
			L.error(`${cluster.name}: request ${method} ${path} failed`, err);
			return failure(toErrorMessage(err));
		}

		const text = await response.text();
		let body: unknown;
		try {
			body = text === '' ? {} : JSON.parse(text);
		} catch (err) {
			return failure(`${method} ${path} returned a body that is not JSON (status ${response.status})`);
		}
		if (!response.ok) {
			return failure(`${method} ${path} failed, ${describeErrorBody(response.status, body)}`, {
				status: response.status,
			});
		}
		return success(body);
	};

	const indexPath = (index: string) => `/${encodeURIComponent(index)}`;

	return {
		role: cluster.name,
		url: baseUrl,

		ping: async () => {
			const result = await request('GET', '/', { retry: true });
			if (!result.success) {
				return result;
			}
			const root = parseWith(ClusterResponses.Root, result.data);
			if (!root.success) {
				return root;
			}
			return success({ clusterName: root.data.cluster_name, version: root.data.version.number });
		},

		listIndices: async (pattern: string) => {
			const result = await request(
				'GET',
				`/_cat/indices/${encodeURIComponent(pattern)}?format=json&h=index,docs.count`,
				{ retry: true },
			);
			if (!result.success) {
				return result;
			}
			const rows = parseWith(ClusterResponses.CatIndices, result.data);
			if (!rows.success) {
				return rows;
			}
			return success(rows.data.map((row) => row.index));
		},

		countDocuments: async (index: string) => {
			const result = await request('GET', `${indexPath(index)}/_count`, { retry: true });
			if (!result.success) {
				return result;
			}
			const count = parseWith(ClusterResponses.Count, result.data);
			if (!count.success) {
				return count;
			}
			return success(count.data.count);
		},

		blockWrites: async (index: string) => {
			const result = await request('PUT', `${indexPath(index)}/_settings`, {
				body: { index: { blocks: { write: true } } },
			});
			if (!result.success) {
				return result;
			}
			return acknowledged('write block', index, result.data);
		},

		reindexFromRemote: async (remote: RemoteSource, index: string) => {
			const result = await request('POST', '/_reindex?wait_for_completion=true', {
				body: {
					source: {
						remote: {
							host: remote.host,
							username: remote.username,
							password: remote.password,
						},
						index,
					},
					dest: { index },
				},
				timeoutMs: http.reindexTimeoutMs ?? 0,
			});
			if (!result.success) {
				return result;
			}
			const reindex = parseWith(ClusterResponses.Reindex, result.data);
			if (!reindex.success) {
				return reindex;
			}
			const { failures, ...counters } = reindex.data;
			return success({ ...counters, failures: failures.length });
		},

		flush: async (index: string) => {
			const result = await request('POST', `${indexPath(index)}/_flush`);
			return result.success ? success(undefined) : result;
		},

		deleteIndex: async (index: string) => {
			const result = await request('DELETE', indexPath(index));
			if (!result.success) {
				return result;
			}
			return acknowledged('delete', index, result.data);
		},

		closeIndex: async (index: string) => {
			const result = await request('POST', `${indexPath(index)}/_close`);
			if (!result.success) {
				return result;
			}
			return acknowledged('close', index, result.data);
		},
	};
};
