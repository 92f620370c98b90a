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
import { VerificationConfig } from '../config';
import { loggerFor } from '../logger';
import { sleep } from '../utils';
import { fetchCount } from './count-oracle';
import { countsMatch, describeCount, DocCount, unknownCount } from './migration-entities';
const L = loggerFor(__filename);

export type Wait = (milliSeconds: number) => Promise<unknown>;

export interface VerificationResult {
	verified: boolean;
	attempts: number;
	sourceCount: DocCount;
	destCount: DocCount;
}

/**
 * Flushes the destination copy, then compares both counts up to `retryCount` times,
 * `retryIntervalMs` apart, stopping at the first match.
 */
export const verifyCounts = async (
	index: string,
	clusters: ClusterPair,
	verification: Readonly<VerificationConfig>,
	wait: Wait = sleep,
): Promise<VerificationResult> => {
	const flushed = await clusters.destination.flush(index);
	if (!flushed.success) {
		L.warn(`flush of ${index} on the destination failed, counting anyway: ${flushed.message}`);
	}

	let attempts = 0;
	let sourceCount: DocCount = unknownCount('not fetched');
	let destCount: DocCount = unknownCount('not fetched');
	while (attempts < verification.retryCount) {
		if (attempts > 0) {
			await wait(verification.retryIntervalMs);
		}
		attempts++;
		sourceCount = await fetchCount(clusters.source, index);
		destCount = await fetchCount(clusters.destination, index);
		L.info(
			`${index} verification ${attempts}/${verification.retryCount}: ` +
				`source=${describeCount(sourceCount)} destination=${describeCount(destCount)}`,
		);
		if (countsMatch(sourceCount, destCount)) {
			return { verified: true, attempts, sourceCount, destCount };
		}
	}
	return { verified: false, attempts, sourceCount, destCount };
};
