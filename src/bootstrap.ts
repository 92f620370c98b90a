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

import { checkClusterHealth, getHealth } from './app-health';
import { ClusterPair, createClusterClient } from './cluster/cluster-client';
import { MigrationConfig } from './config';
import { loggerFor } from './logger';
import { MigrationManager } from './migration/migration-manager';
import { fileJournal, noopJournal, readInterrupted } from './migration/migration-journal';
import { hasFailures, summarizeReport } from './migration/migration-report';
const L = loggerFor(__filename);

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;

const describeSettings = (config: MigrationConfig) =>
	[
		`include=${config.includePattern}`,
		`exclude=${config.excludePattern.source}`,
		`overwriteIfBroken=${config.overwriteIfBroken}`,
		`closeOnSuccess=${config.closeOnSuccess}`,
		`lockFailurePolicy=${config.lockFailurePolicy}`,
		`verification=${config.verification.retryCount}x${config.verification.retryIntervalMs}ms`,
		`dryRun=${config.dryRun}`,
	].join(' ');

const warnAboutInterruptedRun = async (journalPath: string) => {
	const interrupted = await readInterrupted(journalPath);
	interrupted.forEach((entry) =>
		L.warn(
			`${entry.index} was left in state ${entry.state} at ${entry.timestamp} by an earlier run, ` +
				'its state will be re-derived from the cluster counts',
		),
	);
};

/**
 * Runs one migration pass and returns the process exit code.
 */
export const run = async (config: MigrationConfig, clusters?: ClusterPair): Promise<number> => {
	const pair: ClusterPair = clusters || {
		source: createClusterClient(config.source, config.http),
		destination: createClusterClient(config.destination, config.http),
	};
	L.info(`migrating from ${pair.source.url} to ${pair.destination.url}: ${describeSettings(config)}`);

	const sourceUp = await checkClusterHealth(pair.source);
	const destinationUp = await checkClusterHealth(pair.destination);
	L.debug(`cluster health: ${getHealth().all.statusText}`);
	if (!sourceUp || !destinationUp) {
		L.error('a cluster is unreachable, no index was touched');
		return EXIT_FAILURES;
	}

	if (config.journalPath) {
		await warnAboutInterruptedRun(config.journalPath);
	}

	let currentIndex: string | undefined;
	const interrupt = (signal: string) => {
		L.warn(
			currentIndex
				? `${signal} received while migrating ${currentIndex}, it may be left write-blocked`
				: `${signal} received`,
		);
		process.exit(130);
	};
	process.once('SIGINT', interrupt).once('SIGTERM', interrupt);

	try {
		const report = await MigrationManager.run({
			config,
			clusters: pair,
			journal: config.journalPath ? fileJournal(config.journalPath) : noopJournal,
			onIndexStart: (index) => {
				currentIndex = index;
			},
		});
		summarizeReport(report).forEach((line) => L.info(line));
		return hasFailures(report) ? EXIT_FAILURES : EXIT_OK;
	} finally {
		process.removeListener('SIGINT', interrupt).removeListener('SIGTERM', interrupt);
	}
};
