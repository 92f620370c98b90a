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

import { ClusterPair } from '../cluster/cluster-client';
import { RemoteSource } from '../cluster/cluster-entities';
import { clusterUrl, MigrationConfig } from '../config';
import { loggerFor } from '../logger';
import { toErrorMessage } from '../utils';
import { resolveConflict } from './conflict-resolver';
import { finalizeVerified, reportFailure } from './finalizer';
import { discoverCandidates } from './index-lister';
import {
	discovered,
	DocCount,
	IndexDescriptor,
	IndexState,
	MigrationOutcome,
	RunReport,
	transition,
} from './migration-entities';
import { MigrationJournal } from './migration-journal';
import { describeOutcome } from './migration-report';
import { verifyCounts, Wait } from './verifier';

const L = loggerFor(__filename);

export interface MigrationContext {
	config: MigrationConfig;
	clusters: ClusterPair;
	journal: MigrationJournal;
	wait?: Wait;
	now?: () => Date;
	onIndexStart?: (index: string) => void;
}

export namespace MigrationManager {
	/**
	 * Migrates every source candidate in name order, one index at a time.
	 * A failing index is reported and the loop carries on with the next one.
	 */
	export const run = async (context: MigrationContext): Promise<RunReport> => {
		const now = context.now || (() => new Date());
		const { config, clusters } = context;
		const startedAt = now();

		const candidates = await discoverCandidates(
			clusters,
			config.includePattern,
			config.excludePattern,
		);
		if (candidates.source.length === 0) {
			L.info('no source candidates, nothing to migrate');
		}

		const outcomes: MigrationOutcome[] = [];
		for (const index of candidates.source) {
			context.onIndexStart?.(index);
			const outcome = await migrateIndex(index, candidates.destination.has(index), context);
			L.info(describeOutcome(outcome));
			outcomes.push(outcome);
		}

		return { startedAt, finishedAt: now(), candidates: candidates.source, outcomes };
	};

	export const migrateIndex = async (
		index: string,
		existsOnDestination: boolean,
		context: MigrationContext,
	): Promise<MigrationOutcome> => {
		const tracker = { descriptor: discovered(index) };
		try {
			return await runStateMachine(tracker, existsOnDestination, context);
		} catch (err) {
			L.error(`unexpected error while migrating ${index}`, err);
			return { kind: 'ERRORED', index: tracker.descriptor, reason: toErrorMessage(err) };
		}
	};

	const remoteSourceOf = (config: MigrationConfig): RemoteSource => ({
		host: config.source.remoteHost || clusterUrl(config.source),
		username: config.source.username,
		password: config.source.password,
	});

	async function runStateMachine(
		tracker: { descriptor: IndexDescriptor },
		existsOnDestination: boolean,
		context: MigrationContext,
	): Promise<MigrationOutcome> {
		const { config, clusters, journal } = context;
		const index = tracker.descriptor.name;
		const advance = async (
			to: IndexState,
			counts?: { sourceCount: DocCount; destCount: DocCount },
		) => {
			tracker.descriptor = transition(tracker.descriptor, to, counts);
			await journal.record(tracker.descriptor);
			return tracker.descriptor;
		};
		await journal.record(tracker.descriptor);

		const conflict = await resolveConflict(index, existsOnDestination, clusters, config);
		const checked = await advance(IndexState.CONFLICT_CHECKED, {
			sourceCount: conflict.sourceCount,
			destCount: conflict.destCount,
		});
		switch (conflict.decision) {
			case 'ALREADY_MIGRATED':
				return { kind: 'ALREADY_MIGRATED', index: await advance(IndexState.FINALIZED) };
			case 'BLOCKED':
				return { kind: 'BLOCKED', index: checked, reason: conflict.reason || 'counts differ' };
			case 'UNDETERMINED':
				return { kind: 'UNDETERMINED', index: checked };
		}

		if (config.dryRun) {
			return {
				kind: 'PLANNED',
				index: checked,
				action: conflict.decision === 'OVERWRITE' ? 'OVERWRITE_AND_MIGRATE' : 'MIGRATE',
			};
		}

		const locked = await clusters.source.blockWrites(index);
		if (!locked.success) {
			if (config.lockFailurePolicy === 'abort') {
				L.error(`write block on ${index} failed, index not migrated: ${locked.message}`);
				return {
					kind: 'LOCK_FAILED',
					index: await advance(IndexState.FAILED),
					reason: locked.message,
				};
			}
			L.warn(`write block on ${index} failed, copying it while writable: ${locked.message}`);
		} else {
			L.info(`${index} write-blocked on the source`);
		}
		await advance(IndexState.READ_ONLY_LOCKED);

		L.info(`reindexing ${index} from ${clusters.source.url} into ${clusters.destination.url}`);
		const reindexed = await clusters.destination.reindexFromRemote(remoteSourceOf(config), index);
		if (reindexed.success) {
			const summary = reindexed.data;
			L.info(
				`reindex of ${index} returned: total=${summary.total} created=${summary.created} ` +
					`failures=${summary.failures}`,
			);
		} else {
			// the counts decide, not the reindex reply
			L.warn(`reindex of ${index} reported an error, verifying counts anyway: ${reindexed.message}`);
		}
		await advance(IndexState.REINDEXED);
		await advance(IndexState.VERIFYING);

		const verification = await verifyCounts(index, clusters, config.verification, context.wait);
		const observed = { sourceCount: verification.sourceCount, destCount: verification.destCount };
		if (!verification.verified) {
			const failed = await advance(IndexState.FAILED, observed);
			reportFailure(failed, verification.attempts);
			return { kind: 'VERIFICATION_FAILED', index: failed, attempts: verification.attempts };
		}
		const verified = await advance(IndexState.VERIFIED, observed);

		const finalized = await finalizeVerified(verified, clusters, config);
		if (!finalized.success) {
			return { kind: 'FINALIZE_FAILED', index: verified, reason: finalized.message };
		}
		return {
			kind: 'MIGRATED',
			index: await advance(IndexState.FINALIZED),
			destinationClosed: finalized.data.destinationClosed,
		};
	}
}
