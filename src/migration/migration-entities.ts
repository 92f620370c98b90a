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

import { Errors } from '../utils';

/**
 * A document count as observed on a cluster. `unknown` stands for an unreachable
 * cluster or an unreadable reply, it is never the same as zero documents.
 */
export type DocCount =
	| { readonly kind: 'known'; readonly value: number }
	| { readonly kind: 'unknown'; readonly reason: string };

export const knownCount = (value: number): DocCount => ({ kind: 'known', value });
export const unknownCount = (reason: string): DocCount => ({ kind: 'unknown', reason });

export const countsMatch = (left: DocCount, right: DocCount): boolean =>
	left.kind === 'known' && right.kind === 'known' && left.value === right.value;

export const describeCount = (count: DocCount) =>
	count.kind === 'known' ? `${count.value}` : 'unknown';

export enum IndexState {
	DISCOVERED = 'DISCOVERED',
	CONFLICT_CHECKED = 'CONFLICT_CHECKED',
	READ_ONLY_LOCKED = 'READ_ONLY_LOCKED',
	REINDEXED = 'REINDEXED',
	VERIFYING = 'VERIFYING',
	VERIFIED = 'VERIFIED',
	FAILED = 'FAILED',
	FINALIZED = 'FINALIZED',
}

const allowedTransitions: Record<IndexState, ReadonlyArray<IndexState>> = {
	[IndexState.DISCOVERED]: [IndexState.CONFLICT_CHECKED],
	[IndexState.CONFLICT_CHECKED]: [
		IndexState.READ_ONLY_LOCKED,
		IndexState.FINALIZED,
		IndexState.FAILED,
	],
	[IndexState.READ_ONLY_LOCKED]: [IndexState.REINDEXED],
	[IndexState.REINDEXED]: [IndexState.VERIFYING],
	[IndexState.VERIFYING]: [IndexState.VERIFIED, IndexState.FAILED],
	[IndexState.VERIFIED]: [IndexState.FINALIZED],
	[IndexState.FAILED]: [],
	[IndexState.FINALIZED]: [],
};

export const isTerminal = (state: IndexState) => allowedTransitions[state].length === 0;

export type IndexDescriptor = Readonly<{
	name: string;
	state: IndexState;
	sourceCount: DocCount;
	destCount: DocCount;
}>;

export const discovered = (name: string): IndexDescriptor => ({
	name,
	state: IndexState.DISCOVERED,
	sourceCount: unknownCount('not fetched'),
	destCount: unknownCount('not fetched'),
});

/**
 * Returns the descriptor moved to `to`, throws when the state machine has no such edge.
 */
export const transition = (
	descriptor: IndexDescriptor,
	to: IndexState,
	counts: { sourceCount?: DocCount; destCount?: DocCount } = {},
): IndexDescriptor => {
	if (!allowedTransitions[descriptor.state].includes(to)) {
		throw new Errors.InvalidStateTransition(descriptor.name, descriptor.state, to);
	}
	return {
		name: descriptor.name,
		state: to,
		sourceCount: counts.sourceCount || descriptor.sourceCount,
		destCount: counts.destCount || descriptor.destCount,
	};
};

export type OutcomeKind =
	| 'MIGRATED'
	| 'ALREADY_MIGRATED'
	| 'BLOCKED'
	| 'UNDETERMINED'
	| 'LOCK_FAILED'
	| 'VERIFICATION_FAILED'
	| 'FINALIZE_FAILED'
	| 'PLANNED'
	| 'ERRORED';

export type PlannedAction = 'MIGRATE' | 'OVERWRITE_AND_MIGRATE';

export type MigrationOutcome =
	| { kind: 'MIGRATED'; index: IndexDescriptor; destinationClosed: boolean }
	| { kind: 'ALREADY_MIGRATED'; index: IndexDescriptor }
	| { kind: 'BLOCKED'; index: IndexDescriptor; reason: string }
	| { kind: 'UNDETERMINED'; index: IndexDescriptor }
	| { kind: 'LOCK_FAILED'; index: IndexDescriptor; reason: string }
	| { kind: 'VERIFICATION_FAILED'; index: IndexDescriptor; attempts: number }
	| { kind: 'FINALIZE_FAILED'; index: IndexDescriptor; reason: string }
	| { kind: 'PLANNED'; index: IndexDescriptor; action: PlannedAction }
	| { kind: 'ERRORED'; index: IndexDescriptor; reason: string };

export const FAILURE_OUTCOMES: ReadonlyArray<OutcomeKind> = [
	'LOCK_FAILED',
	'VERIFICATION_FAILED',
	'FINALIZE_FAILED',
	'ERRORED',
];

export interface RunReport {
	startedAt: Date;
	finishedAt: Date;
	candidates: string[];
	outcomes: MigrationOutcome[];
}
