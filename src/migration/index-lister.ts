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
import { ClusterClient, ClusterPair } from '../cluster/cluster-client';
import { loggerFor } from '../logger';
import { toIndexDateSuffix } from '../utils';
const L = loggerFor(__filename);

export interface Candidates {
	source: string[];
	destination: ReadonlySet<string>;
}

/**
 * Index names matching `includePattern`, sorted. A cluster that cannot be listed
 * yields no names, callers treat that the same as no matches.
 */
export const listIndices = async (client: ClusterClient, includePattern: string) => {
	const result = await client.listIndices(includePattern);
	if (!result.success) {
		L.error(`could not list ${includePattern} on the ${client.role} cluster: ${result.message}`);
		return [];
	}
	return _.sortedUniq(_.sortBy(result.data));
};

export const excludeMatching = (names: ReadonlyArray<string>, excludePattern: RegExp) =>
	names.filter((name) => {
		// a global or sticky expression would carry its position over to the next name
		excludePattern.lastIndex = 0;
		return !excludePattern.test(name);
	});

// indices stamped with today's date still receive writes
export const currentDateExclusion = (now: Date) =>
	new RegExp(`${_.escapeRegExp(toIndexDateSuffix(now))}$`);

export const discoverCandidates = async (
	clusters: ClusterPair,
	includePattern: string,
	excludePattern: RegExp,
): Promise<Candidates> => {
	const sourceNames = excludeMatching(
		await listIndices(clusters.source, includePattern),
		excludePattern,
	);
	const destinationNames = excludeMatching(
		await listIndices(clusters.destination, includePattern),
		excludePattern,
	);
	L.info(`source candidates (${sourceNames.length}): ${sourceNames.join(', ') || '-'}`);
	L.info(
		`destination candidates (${destinationNames.length}): ${destinationNames.join(', ') || '-'}`,
	);
	return { source: sourceNames, destination: new Set(destinationNames) };
};
