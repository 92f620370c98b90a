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
import { finalizeVerified } from '../../../src/migration/finalizer';
import {
	discovered,
	IndexDescriptor,
	IndexState,
	knownCount,
	unknownCount,
} from '../../../src/migration/migration-entities';
import { Errors } from '../../../src/utils';
import { clusterPair } from '../stubs';

const INDEX = 'wazuh-alerts-4.x-2024.01.01';

const verifiedDescriptor = (overrides: Partial<IndexDescriptor> = {}): IndexDescriptor => ({
	...discovered(INDEX),
	state: IndexState.VERIFIED,
	sourceCount: knownCount(1000),
	destCount: knownCount(1000),
	...overrides,
});

describe('finalizer', () => {
	it('deletes the source and closes the destination', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);
		clusters.destination.withIndex(INDEX, 1000);

		const result = await finalizeVerified(verifiedDescriptor(), clusters, { closeOnSuccess: true });

		chai.expect(result).to.deep.eq({ success: true, data: { destinationClosed: true } });
		chai.expect(clusters.source.indices.has(INDEX)).to.be.false;
		chai.expect(clusters.destination.indices.get(INDEX)?.closed).to.be.true;
	});

	it('leaves the destination open unless configured', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);
		clusters.destination.withIndex(INDEX, 1000);

		const result = await finalizeVerified(verifiedDescriptor(), clusters, { closeOnSuccess: false });

		chai.expect(result).to.deep.eq({ success: true, data: { destinationClosed: false } });
		chai.expect(clusters.destination.callsTo('close')).to.deep.eq([]);
	});

	it('reports a failed close without failing the migration', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);
		clusters.destination.withIndex(INDEX, 1000);
		clusters.destination.failing.add('close');

		const result = await finalizeVerified(verifiedDescriptor(), clusters, { closeOnSuccess: true });

		chai.expect(result).to.deep.eq({ success: true, data: { destinationClosed: false } });
		chai.expect(clusters.source.indices.has(INDEX)).to.be.false;
	});

	it('returns a failure when the source cannot be deleted', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);
		clusters.destination.withIndex(INDEX, 1000);
		clusters.source.failing.add('delete');

		const result = await finalizeVerified(verifiedDescriptor(), clusters, { closeOnSuccess: true });

		chai.expect(result.success).to.be.false;
		chai.expect(result.success ? undefined : result.message).to.eq(`delete of ${INDEX} failed`);
		chai.expect(clusters.destination.callsTo('close')).to.deep.eq([]);
	});

	it('refuses to delete a source whose count is unknown', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);

		let thrown: unknown;
		try {
			await finalizeVerified(
				verifiedDescriptor({ sourceCount: unknownCount('timeout') }),
				clusters,
				{ closeOnSuccess: true },
			);
		} catch (err) {
			thrown = err;
		}

		chai.expect(thrown).to.be.instanceOf(Errors.UnsafeDeletion);
		chai.expect(clusters.source.callsTo('delete')).to.deep.eq([]);
	});

	it('refuses to delete a source that is not verified', async () => {
		const clusters = clusterPair();
		clusters.source.withIndex(INDEX, 1000);

		let thrown: unknown;
		try {
			await finalizeVerified(
				verifiedDescriptor({ state: IndexState.VERIFYING }),
				clusters,
				{ closeOnSuccess: false },
			);
		} catch (err) {
			thrown = err;
		}

		chai.expect(thrown).to.be.instanceOf(Errors.UnsafeDeletion);
		chai.expect(clusters.source.indices.has(INDEX)).to.be.true;
	});
});
