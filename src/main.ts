#!/usr/bin/env node
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

// dotenv has to run before any other import reads the environment
import dotenv from 'dotenv';
if (process.env.NODE_ENV !== 'PRODUCTION') {
	dotenv.config();
}
import * as bootstrap from './bootstrap';
import { MigrationConfig } from './config';
import { loadConfigFromEnv, Secrets } from './env-config';
import { loggerFor } from './logger';
import { toErrorMessage } from './utils';
import * as vault from './vault-k8s';
const L = loggerFor(__filename);

const EXIT_CONFIGURATION_ERROR = 2;

const loadSecrets = async (): Promise<Secrets> => {
	if (process.env.VAULT_ENABLED !== 'true') {
		return {};
	}
	if (!process.env.VAULT_SECRETS_PATH) {
		throw new Error('Path to secrets not specified but vault is enabled');
	}
	try {
		const secrets = await vault.loadSecret(process.env.VAULT_SECRETS_PATH);
		L.info(`secret keys found ====> ${Object.keys(secrets)}`);
		return secrets;
	} catch (err) {
		L.error('failed to load secrets from vault', err);
		throw new Error('failed to load secrets from vault.');
	}
};

(async () => {
	let config: MigrationConfig;
	try {
		config = loadConfigFromEnv(process.env, await loadSecrets());
	} catch (err) {
		L.error(toErrorMessage(err));
		process.exit(EXIT_CONFIGURATION_ERROR);
	}

	// exit explicitly, a timed out request may still hold a socket open
	process.exit(await bootstrap.run(config));
})().catch((err) => {
	L.error('migration run failed', err);
	process.exit(bootstrap.EXIT_FAILURES);
});
