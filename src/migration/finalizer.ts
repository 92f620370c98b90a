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
import { Errors } from '../utils';
import { AsyncResult, failure, success } from '../utils/results';
import { countsMatch, describeCount, IndexDescriptor, IndexState } from './migration-entities';
const L = loggerFor(__filename);

export interface Finalized {
	destinationClosed: boolean;
}

const assertSafeToDelete = (descriptor: IndexDescriptor) => {
	if (descriptor.state !== IndexState.VERIFIED) {
		throw new Errors.UnsafeDeletion(
			`refusing to delete source index ${descriptor.name} in state ${descriptor.state}`,
		);
	}
	if (!countsMatch(descriptor.sourceCount, descriptor.destCount)) {
		throw new Errors.UnsafeDeletion(
			`refusing to delete source index ${descriptor.name}, counts source=${describeCount(
				descriptor.sourceCount,
			)} destination=${describeCount(descriptor.destCount)}`,
		);
	}
};

/**
 * Deletes the verified source index, then closes the destination copy when configured.
 * The source delete is the point of no return: the destination holds the only copy after it.
 */
export const finalizeVerified = async (
	descriptor: IndexDescriptor,
	clusters: ClusterPair,
	config: Pick<MigrationConfig, 'closeOnSuccess'>,
): AsyncResult<Finalized> => {
	assertSafeToDelete(descriptor);

	const deleted = await clusters.source.deleteIndex(descriptor.name);
	if (!deleted.success) {
		L.error(`could not delete source index ${descriptor.name}: ${deleted.message}`);
		return failure(deleted.message);
	}
	L.info(`deleted source index ${descriptor.name} (${describeCount(descriptor.sourceCount)} docs)`);

	if (!config.closeOnSuccess) {
		return success({ destinationClosed: false });
	}
	const closed = await clusters.destination.closeIndex(descriptor.name);
	if (!closed.success) {
		L.warn(`could not close destination index ${descriptor.name}: ${closed.message}`);
		return success({ destinationClosed: false });
	}
	L.info(`closed destination index ${descriptor.name}`);
	return success({ destinationClosed: true });
};

// leaves both indices as they are, the source keeps its write block for manual inspection
export const reportFailure = (descriptor: IndexDescriptor, attempts: number) => {
	L.error(
		`${descriptor.name} failed verification after ${attempts} attempts: ` +
			`source=${describeCount(descriptor.sourceCount)} ` +
			`destination=${describeCount(descriptor.destCount)}, source left write-blocked`,
	);
};
