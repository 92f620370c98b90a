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

import _ from 'lodash';
import {
	describeCount,
	FAILURE_OUTCOMES,
	IndexDescriptor,
	MigrationOutcome,
	RunReport,
} from './migration-entities';

const counts = (index: IndexDescriptor) =>
	`source=${describeCount(index.sourceCount)} destination=${describeCount(index.destCount)}`;

export const describeOutcome = (outcome: MigrationOutcome): string => {
	const name = outcome.index.name;
	switch (outcome.kind) {
		case 'MIGRATED':
			return (
				`${name}: migrated, ${describeCount(outcome.index.destCount)} documents, ` +
				`destination ${outcome.destinationClosed ? 'closed' : 'left open'}`
			);
		case 'ALREADY_MIGRATED':
			return `${name}: already migrated (${describeCount(outcome.index.destCount)} documents), nothing done`;
		case 'BLOCKED':
			return `${name}: skipped, ${outcome.reason}`;
		case 'UNDETERMINED':
			return `${name}: skipped, counts cannot be compared (${counts(outcome.index)})`;
		case 'LOCK_FAILED':
			return `${name}: not migrated, write block failed: ${outcome.reason}`;
		case 'VERIFICATION_FAILED':
			return (
				`${name}: FAILED after ${outcome.attempts} verification attempts ` +
				`(${counts(outcome.index)}), source left write-blocked`
			);
		case 'FINALIZE_FAILED':
			return `${name}: copied and verified but the source was not deleted: ${outcome.reason}`;
		case 'PLANNED':
			return outcome.action === 'MIGRATE'
				? `${name}: [DRY-RUN] would migrate`
				: `${name}: [DRY-RUN] would delete the destination copy and migrate`;
		case 'ERRORED':
			return `${name}: error: ${outcome.reason}`;
	}
};

export const hasFailures = (report: RunReport) =>
	report.outcomes.some((outcome) => FAILURE_OUTCOMES.includes(outcome.kind));

/**
 * Human readable account of a run, one line per index plus the totals.
 */
export const summarizeReport = (report: RunReport): string[] => {
	const byKind = _.countBy(report.outcomes, (outcome) => outcome.kind);
	const total = (...kinds: MigrationOutcome['kind'][]) =>
		_.sum(kinds.map((kind) => byKind[kind] || 0));
	const seconds = Math.round((report.finishedAt.getTime() - report.startedAt.getTime()) / 1000);

	const totals = [
		`${total('MIGRATED')} migrated`,
		`${total('ALREADY_MIGRATED')} already migrated`,
		`${total('BLOCKED', 'UNDETERMINED')} skipped`,
		`${total(...FAILURE_OUTCOMES)} failed`,
	];
	if (total('PLANNED') > 0) {
		totals.push(`${total('PLANNED')} planned`);
	}

	return [
		`candidates: ${report.candidates.length ? report.candidates.join(', ') : 'none'}`,
		...report.outcomes.map(describeOutcome),
		`done in ${seconds}s: ${totals.join(', ')}`,
	];
};
