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
import { loadConfigFromEnv } from '../../../src/env-config';
import { Errors } from '../../../src/utils';

const NOW = new Date('2024-01-05T12:00:00Z');
const minimal = { SOURCE_HOST: 'indexer-old.internal', DEST_HOST: 'indexer-new.internal' };

describe('env config', () => {
	it('applies the defaults', () => {
		const config = loadConfigFromEnv(minimal, {}, NOW);

		chai.expect(config.source.name).to.eq('source');
		chai.expect(config.source.protocol).to.eq('https');
		chai.expect(config.source.host).to.eq('indexer-old.internal');
		chai.expect(config.source.port).to.eq(9200);
		chai.expect(config.source.username).to.eq('');
		chai.expect(config.destination.name).to.eq('destination');
		chai.expect(config.destination.host).to.eq('indexer-new.internal');
		chai.expect(config.includePattern).to.eq('wazuh-alerts-*');
		chai.expect(config.excludePattern.source).to.eq('2024\\.01\\.05$');
		chai.expect(config.overwriteIfBroken).to.be.false;
		chai.expect(config.closeOnSuccess).to.be.false;
		chai.expect(config.dryRun).to.be.false;
		chai.expect(config.lockFailurePolicy).to.eq('proceed');
		chai.expect(config.journalPath).to.be.undefined;
		chai.expect(config.verification).to.deep.eq({ retryCount: 6, retryIntervalMs: 10000 });
		chai.expect(config.http.requestTimeoutMs).to.eq(30000);
		chai.expect(config.http.reindexTimeoutMs).to.be.undefined;
		chai.expect(config.http.requestRetries).to.eq(3);
		chai.expect(config.http.requestRetryIntervalMs).to.eq(1000);
		chai.expect(config.http.rejectUnauthorized).to.be.true;
	});

	it('reads every option', () => {
		const config = loadConfigFromEnv(
			{
				...minimal,
				SOURCE_PROTOCOL: 'http',
				SOURCE_PORT: '9201',
				SOURCE_USERNAME: 'admin',
				SOURCE_PASSWORD: 'test-secret',
				SOURCE_REMOTE_HOST: 'https://10.0.0.5:9200',
				INCLUDE_PATTERN: 'logs-*',
				EXCLUDE_PATTERN: '-2024\\.01\\.0[45]$',
				OVERWRITE_IF_BROKEN: 'true',
				CLOSE_ON_SUCCESS: 'true',
				DRY_RUN: 'true',
				LOCK_FAILURE_POLICY: 'abort',
				VERIFY_RETRY_COUNT: '3',
				VERIFY_RETRY_INTERVAL: '2s',
				HTTP_REINDEX_TIMEOUT: '2h',
				TLS_REJECT_UNAUTHORIZED: 'false',
				MIGRATION_JOURNAL_PATH: '/var/lib/index-migrator/journal.jsonl',
			},
			{},
			NOW,
		);

		chai.expect(config.source.protocol).to.eq('http');
		chai.expect(config.source.port).to.eq(9201);
		chai.expect(config.source.password).to.eq('test-secret');
		chai.expect(config.source.remoteHost).to.eq('https://10.0.0.5:9200');
		chai.expect(config.includePattern).to.eq('logs-*');
		chai.expect(config.excludePattern.test('logs-2024.01.04')).to.be.true;
		chai.expect(config.overwriteIfBroken).to.be.true;
		chai.expect(config.closeOnSuccess).to.be.true;
		chai.expect(config.dryRun).to.be.true;
		chai.expect(config.lockFailurePolicy).to.eq('abort');
		chai.expect(config.verification).to.deep.eq({ retryCount: 3, retryIntervalMs: 2000 });
		chai.expect(config.http.reindexTimeoutMs).to.eq(7200000);
		chai.expect(config.http.rejectUnauthorized).to.be.false;
		chai.expect(config.journalPath).to.eq('/var/lib/index-migrator/journal.jsonl');
	});

	it('takes credentials from secrets when the env has none', () => {
		const config = loadConfigFromEnv(
			{ ...minimal, DEST_USERNAME: 'env-user', DEST_PASSWORD: '' },
			{
				SOURCE_USERNAME: 'vault-user',
				SOURCE_PASSWORD: 'vault-secret',
				DEST_USERNAME: 'other',
				DEST_PASSWORD: 'dest-secret',
			},
			NOW,
		);

		chai.expect(config.source.username).to.eq('vault-user');
		chai.expect(config.source.password).to.eq('vault-secret');
		chai.expect(config.destination.username).to.eq('env-user');
		chai.expect(config.destination.password).to.eq('dest-secret');
	});

	it('keeps the spaces of a password', () => {
		const config = loadConfigFromEnv(
			{ ...minimal, SOURCE_USERNAME: 'admin', SOURCE_PASSWORD: ' test-secret ' },
			{},
			NOW,
		);

		chai.expect(config.source.password).to.eq(' test-secret ');
	});

	it('treats blank variables as unset', () => {
		const config = loadConfigFromEnv({ ...minimal, SOURCE_PORT: '   ', DRY_RUN: '' }, {}, NOW);

		chai.expect(config.source.port).to.eq(9200);
		chai.expect(config.dryRun).to.be.false;
	});

	it('freezes the configuration', () => {
		const config = loadConfigFromEnv(minimal, {}, NOW);
		chai.expect(Object.isFrozen(config.source)).to.be.true;
		chai.expect(Object.isFrozen(config.verification)).to.be.true;
	});

	it('requires the cluster hosts', () => {
		chai
			.expect(() => loadConfigFromEnv({ DEST_HOST: 'indexer-new.internal' }, {}, NOW))
			.to.throw(Errors.InvalidConfiguration, 'source cluster, host: Required');
	});

	it('rejects flags that are not true or false', () => {
		chai
			.expect(() => loadConfigFromEnv({ ...minimal, OVERWRITE_IF_BROKEN: 'yes' }, {}, NOW))
			.to.throw(Errors.InvalidConfiguration, 'overwriteIfBroken');
	});

	it('rejects durations it cannot read', () => {
		chai
			.expect(() => loadConfigFromEnv({ ...minimal, VERIFY_RETRY_INTERVAL: 'soon' }, {}, NOW))
			.to.throw(Errors.InvalidConfiguration, 'retryInterval: not a valid duration: soon');
	});

	it('rejects an exclusion that is not a regular expression', () => {
		chai
			.expect(() => loadConfigFromEnv({ ...minimal, EXCLUDE_PATTERN: '(' }, {}, NOW))
			.to.throw(Errors.InvalidConfiguration, 'EXCLUDE_PATTERN is not a regular expression: (');
	});
});
