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
import { resolveConflict } from '../../../src/migration/conflict-resolver';
import { knownCount } from '../../../src/migration/migration-entities';
import { clusterPair } from '../stubs';

const INDEX = 'wazuh-alerts-4.x-2024.01.02';

describe('conflict resolver', () => {
	const policy = { overwriteIfBroken: false, dryRun: false };

	it('does not query counts for an index missing on the destination', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 500);

		const resolution = await resolveConflict(INDEX, false, clusters, policy);

		chai.expect(resolution.decision).to.eq('NO_CONFLICT');
		chai.expect(clusters.source.calls).to.deep.eq([]);
		chai.expect(clusters.destination.calls).to.deep.eq([]);
	});

	it('skips an index whose counts already match', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 500);
		clusters.destination.withIndex(INDEX, 500);

		const resolution = await resolveConflict(INDEX, true, clusters, policy);

		chai.expect(resolution).to.deep.eq({
			decision: 'ALREADY_MIGRATED',
			sourceCount: knownCount(500),
			destCount: knownCount(500),
		});
		chai.expect(clusters.destination.callsTo('delete')).to.deep.eq([]);
	});

	it('blocks a mismatched index when overwrite is disabled', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 700);
		clusters.destination.withIndex(INDEX, 650);

		const resolution = await resolveConflict(INDEX, true, clusters, policy);

		chai.expect(resolution.decision).to.eq('BLOCKED');
		chai
			.expect(resolution.reason)
			.to.eq('destination copy differs (source=700 destination=650) and overwrite is disabled');
		chai.expect(clusters.destination.indices.get(INDEX)?.docs).to.eq(650);
		chai.expect(clusters.destination.callsTo('delete')).to.deep.eq([]);
	});

	it('deletes a mismatched destination copy when overwrite is enabled', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 700);
		clusters.destination.withIndex(INDEX, 650);

		const resolution = await resolveConflict(INDEX, true, clusters, {
			overwriteIfBroken: true,
			dryRun: false,
		});

		chai.expect(resolution.decision).to.eq('OVERWRITE');
		chai.expect(clusters.destination.callsTo('delete')).to.deep.eq([INDEX]);
		chai.expect(clusters.destination.indices.has(INDEX)).to.be.false;
		chai.expect(clusters.source.indices.get(INDEX)?.docs).to.eq(700);
	});

	it('only plans the overwrite in a dry run', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 700);
		clusters.destination.withIndex(INDEX, 650);

		const resolution = await resolveConflict(INDEX, true, clusters, {
			overwriteIfBroken: true,
			dryRun: true,
		});

		chai.expect(resolution.decision).to.eq('OVERWRITE');
		chai.expect(clusters.destination.callsTo('delete')).to.deep.eq([]);
	});

	it('blocks the index when the broken copy cannot be deleted', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 700);
		clusters.destination.withIndex(INDEX, 650);
		clusters.destination.failing.add('delete');

		const resolution = await resolveConflict(INDEX, true, clusters, {
			overwriteIfBroken: true,
			dryRun: false,
		});

		chai.expect(resolution.decision).to.eq('BLOCKED');
		chai.expect(clusters.destination.indices.get(INDEX)?.docs).to.eq(650);
	});

	it('takes no action when a count is unknown, even with overwrite enabled', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 700);
		clusters.destination.withIndex(INDEX, 650);
		clusters.destination.failing.add('count');

		const resolution = await resolveConflict(INDEX, true, clusters, {
			overwriteIfBroken: true,
			dryRun: false,
		});

		chai.expect(resolution.decision).to.eq('UNDETERMINED');
		chai.expect(resolution.destCount.kind).to.eq('unknown');
		chai.expect(clusters.destination.callsTo('delete')).to.deep.eq([]);
	});
});
