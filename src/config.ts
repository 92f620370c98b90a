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

import { DeepReadonly } from 'deep-freeze';
import { F } from './utils';

export type ClusterRole = 'source' | 'destination';

export interface ClusterConfig {
	name: ClusterRole;
	protocol: 'http' | 'https';
	host: string;
	port: number;
	username: string;
	password: string;
	// the source address as the destination cluster resolves it, used in remote reindex requests
	remoteHost?: string;
}

export type LockFailurePolicy = 'proceed' | 'abort';

export interface VerificationConfig {
	retryCount: number;
	retryIntervalMs: number;
}

export interface HttpConfig {
	requestTimeoutMs: number;
	reindexTimeoutMs?: number;
	requestRetries: number;
	requestRetryIntervalMs: number;
	rejectUnauthorized: boolean;
}

export interface MigrationConfigInput {
	source: ClusterConfig;
	destination: ClusterConfig;
	includePattern: string;
	excludePattern: RegExp;
	overwriteIfBroken: boolean;
	closeOnSuccess: boolean;
	lockFailurePolicy: LockFailurePolicy;
	dryRun: boolean;
	journalPath?: string;
	verification: VerificationConfig;
	http: HttpConfig;
}

export type MigrationConfig = DeepReadonly<Omit<MigrationConfigInput, 'excludePattern'>> & {
	readonly excludePattern: RegExp;
};

export const DEFAULT_INCLUDE_PATTERN = 'wazuh-alerts-*';

export const defaultVerification: VerificationConfig = {
	retryCount: 6,
	retryIntervalMs: 10 * 1000,
};

export const defaultHttp: HttpConfig = {
	requestTimeoutMs: 30 * 1000,
	requestRetries: 3,
	requestRetryIntervalMs: 1000,
	rejectUnauthorized: true,
};

/**
 * The configuration is read once and passed explicitly to every component;
 * freezing it keeps the run from changing it halfway.
 */
export const initConfigs = (configs: MigrationConfigInput): MigrationConfig => {
	// RegExp instances are kept as they are, freezing one breaks lastIndex bookkeeping
	const { excludePattern, ...rest } = configs;
	return { ...F(rest), excludePattern };
};

export const clusterUrl = (cluster: Pick<ClusterConfig, 'protocol' | 'host' | 'port'>) =>
	`${cluster.protocol}://${cluster.host}:${cluster.port}`;
