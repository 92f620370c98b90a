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

import ms from 'ms';
import { z as zod } from 'zod';
import {
	ClusterConfig,
	ClusterRole,
	DEFAULT_INCLUDE_PATTERN,
	defaultHttp,
	defaultVerification,
	initConfigs,
	MigrationConfig,
} from './config';
import { currentDateExclusion } from './migration/index-lister';
import { Errors } from './utils';

export type Secrets = Record<string, string | undefined>;

const flag = (defaultValue: 'true' | 'false') =>
	zod
		.enum(['true', 'false'])
		.default(defaultValue)
		.transform((value) => value === 'true');

const duration = zod.string().transform((value, ctx) => {
	const millis = ms(value);
	if (typeof millis !== 'number' || !Number.isFinite(millis) || millis < 0) {
		ctx.addIssue({ code: zod.ZodIssueCode.custom, message: `not a valid duration: ${value}` });
		return zod.NEVER;
	}
	return millis;
});

const ClusterEnv = zod.object({
	protocol: zod.enum(['http', 'https']).default('https'),
	host: zod.string().min(1),
	port: zod.coerce
		.number()
		.int()
		.positive()
		.default(9200),
	username: zod.string().default(''),
	password: zod.string().default(''),
	remoteHost: zod
		.string()
		.url()
		.optional(),
});

const OptionsEnv = zod.object({
	includePattern: zod
		.string()
		.min(1)
		.default(DEFAULT_INCLUDE_PATTERN),
	excludePattern: zod.string().optional(),
	overwriteIfBroken: flag('false'),
	closeOnSuccess: flag('false'),
	dryRun: flag('false'),
	lockFailurePolicy: zod.enum(['proceed', 'abort']).default('proceed'),
	retryCount: zod.coerce
		.number()
		.int()
		.positive()
		.default(defaultVerification.retryCount),
	retryInterval: duration.default(`${defaultVerification.retryIntervalMs}`),
	requestTimeout: duration.default(`${defaultHttp.requestTimeoutMs}`),
	reindexTimeout: duration.optional(),
	requestRetries: zod.coerce
		.number()
		.int()
		.positive()
		.default(defaultHttp.requestRetries),
	requestRetryInterval: duration.default(`${defaultHttp.requestRetryIntervalMs}`),
	rejectUnauthorized: flag('true'),
	journalPath: zod.string().optional(),
});

// empty variables count as unset, `FOO=` in a .env file is common
const valueOf = (env: NodeJS.ProcessEnv, key: string): string | undefined => {
	const value = env[key];
	return value === undefined || value.trim() === '' ? undefined : value;
};

const describeIssues = (error: zod.ZodError) =>
	error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');

const readCluster = (
	name: ClusterRole,
	prefix: 'SOURCE' | 'DEST',
	env: NodeJS.ProcessEnv,
	secrets: Secrets,
): ClusterConfig => {
	const parsed = ClusterEnv.safeParse({
		protocol: valueOf(env, `${prefix}_PROTOCOL`),
		host: valueOf(env, `${prefix}_HOST`),
		port: valueOf(env, `${prefix}_PORT`),
		username: valueOf(env, `${prefix}_USERNAME`) || secrets[`${prefix}_USERNAME`],
		password: valueOf(env, `${prefix}_PASSWORD`) || secrets[`${prefix}_PASSWORD`],
		remoteHost: valueOf(env, `${prefix}_REMOTE_HOST`),
	});
	if (!parsed.success) {
		throw new Errors.InvalidConfiguration(`${name} cluster, ${describeIssues(parsed.error)}`);
	}
	return { name, ...parsed.data };
};

const toRegExp = (expression: string) => {
	try {
		return new RegExp(expression);
	} catch (err) {
		throw new Errors.InvalidConfiguration(`EXCLUDE_PATTERN is not a regular expression: ${expression}`);
	}
};

/**
 * Builds the run configuration from environment variables, falling back to
 * vault secrets for cluster credentials.
 */
export const loadConfigFromEnv = (
	env: NodeJS.ProcessEnv,
	secrets: Secrets = {},
	now: Date = new Date(),
): MigrationConfig => {
	const source = readCluster('source', 'SOURCE', env, secrets);
	const destination = readCluster('destination', 'DEST', env, secrets);

	const parsed = OptionsEnv.safeParse({
		includePattern: valueOf(env, 'INCLUDE_PATTERN'),
		excludePattern: valueOf(env, 'EXCLUDE_PATTERN'),
		overwriteIfBroken: valueOf(env, 'OVERWRITE_IF_BROKEN'),
		closeOnSuccess: valueOf(env, 'CLOSE_ON_SUCCESS'),
		dryRun: valueOf(env, 'DRY_RUN'),
		lockFailurePolicy: valueOf(env, 'LOCK_FAILURE_POLICY'),
		retryCount: valueOf(env, 'VERIFY_RETRY_COUNT'),
		retryInterval: valueOf(env, 'VERIFY_RETRY_INTERVAL'),
		requestTimeout: valueOf(env, 'HTTP_REQUEST_TIMEOUT'),
		reindexTimeout: valueOf(env, 'HTTP_REINDEX_TIMEOUT'),
		requestRetries: valueOf(env, 'HTTP_REQUEST_RETRIES'),
		requestRetryInterval: valueOf(env, 'HTTP_REQUEST_RETRY_INTERVAL'),
		rejectUnauthorized: valueOf(env, 'TLS_REJECT_UNAUTHORIZED'),
		journalPath: valueOf(env, 'MIGRATION_JOURNAL_PATH'),
	});
	if (!parsed.success) {
		throw new Errors.InvalidConfiguration(describeIssues(parsed.error));
	}
	const options = parsed.data;

	return initConfigs({
		source,
		destination,
		includePattern: options.includePattern,
		excludePattern: options.excludePattern
			? toRegExp(options.excludePattern)
			: currentDateExclusion(now),
		overwriteIfBroken: options.overwriteIfBroken,
		closeOnSuccess: options.closeOnSuccess,
		lockFailurePolicy: options.lockFailurePolicy,
		dryRun: options.dryRun,
		journalPath: options.journalPath,
		verification: {
			retryCount: options.retryCount,
			retryIntervalMs: options.retryInterval,
		},
		http: {
			requestTimeoutMs: options.requestTimeout,
			reindexTimeoutMs: options.reindexTimeout,
			requestRetries: options.requestRetries,
			requestRetryIntervalMs: options.requestRetryInterval,
			rejectUnauthorized: options.rejectUnauthorized,
		},
	});
};
