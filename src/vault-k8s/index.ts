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

import vault from 'node-vault';
import { promises } from 'fs';
import { loggerFor } from '../logger';
import { Secrets } from '../env-config';
import { Checks } from '../utils';
const L = loggerFor(__filename);

type VaultClient = ReturnType<typeof vault>;
let vaultClient: VaultClient | undefined;

async function login(): Promise<VaultClient> {
	// if a token is provided in the env use that
	const givenToken = process.env.VAULT_TOKEN;
	if (givenToken) {
		return vault({
			apiVersion: 'v1',
			endpoint: process.env.VAULT_URL || 'http://localhost:8200',
			token: givenToken,
		});
	}

	// otherwise exchange the kubernetes service account token for a vault token
	const k8sToken = await promises.readFile(
		'/var/run/secrets/kubernetes.io/serviceaccount/token',
		'utf-8',
	);
	const client = vault({
		apiVersion: 'v1',
		endpoint: process.env.VAULT_URL,
	});
	const response = await client.kubernetesLogin({
		role: process.env.VAULT_ROLE,
		jwt: k8sToken,
	});
	const clientToken: string = response.auth.client_token;
	client.token = clientToken;
	L.info(`vault login successful, token length: ${clientToken.length}`);
	return client;
}

const toSecrets = (data: unknown): Secrets => {
	const secrets: Secrets = {};
	if (data && typeof data === 'object') {
		Object.entries(data).forEach(([key, value]) => {
			if (typeof value === 'string') {
				secrets[key] = value;
			}
		});
	}
	return secrets;
};

/**
 * Reads cluster credentials stored under `key` (kv v1 or v2 layout).
 */
export async function loadSecret(key: string): Promise<Secrets> {
	Checks.checkNotEmpty('key', key);
	if (!vaultClient) {
		vaultClient = await login();
	}

	const result = await vaultClient.read(key);
	L.info(`loaded secret ${key}`);
	if (result.data.data) {
		return toSecrets(result.data.data);
	}
	return toSecrets(result.data);
}
