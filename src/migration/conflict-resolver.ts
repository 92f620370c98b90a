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
import { MigrationConfig } from '../config';
import { loggerFor } from '../logger';
import { fetchCount } from './count-oracle';
import { countsMatch, describeCount, DocCount, unknownCount } from './migration-entities';
const L = loggerFor(__filename);

export type ConflictDecision =
	| 'NO_CONFLICT'
	| 'ALREADY_MIGRATED'
	| 'BLOCKED'
	| 'UNDETERMINED'
	| 'OVERWRITE';

export interface ConflictResolution {
	decision: ConflictDecision;
	sourceCount: DocCount;
	destCount: DocCount;
	reason?: string;
}

/**
 * Decides what to do with a source candidate given what the destination already holds.
 * With `overwriteIfBroken` a destination copy whose count differs is deleted here,
 * before the index is copied again.
 */
export const resolveConflict = async (
	index: string,
	existsOnDestination: boolean,
	clusters: ClusterPair,
	config: Pick<MigrationConfig, 'overwriteIfBroken' | 'dryRun'>,
): Promise<ConflictResolution> => {
	if (!existsOnDestination) {
		return {
			decision: 'NO_CONFLICT',
			sourceCount: unknownCount('not fetched'),
			destCount: unknownCount('not fetched'),
		};
	}

	const sourceCount = await fetchCount(clusters.source, index);
	const destCount = await fetchCount(clusters.destination, index);
	const counts = `source=${describeCount(sourceCount)} destination=${describeCount(destCount)}`;

	if (sourceCount.kind === 'unknown' || destCount.kind === 'unknown') {
		L.warn(`${index} exists on both clusters but its counts cannot be compared (${counts})`);
		return { decision: 'UNDETERMINED', sourceCount, destCount };
	}

	if (countsMatch(sourceCount, destCount)) {
		L.info(`${index} already migrated (${counts})`);
		return { decision: 'ALREADY_MIGRATED', sourceCount, destCount };
	}

	if (!config.overwriteIfBroken) {
		const reason = `destination copy differs (${counts}) and overwrite is disabled`;
		L.warn(`${index} blocked: ${reason}`);
		return { decision: 'BLOCKED', sourceCount, destCount, reason };
	}

	if (config.dryRun) {
		L.info(`[DRY-RUN] would delete the destination copy of ${index} (${counts})`);
		return { decision: 'OVERWRITE', sourceCount, destCount };
	}

	L.info(`deleting the broken destination copy of ${index} (${counts})`);
	const deleted = await clusters.destination.deleteIndex(index);
	if (!deleted.success) {
		const reason = `destination copy differs (${counts}) and could not be deleted: ${deleted.message}`;
		L.warn(`${index} blocked: ${reason}`);
		return { decision: 'BLOCKED', sourceCount, destCount, reason };
	}
	return { decision: 'OVERWRITE', sourceCount, destCount };
};
