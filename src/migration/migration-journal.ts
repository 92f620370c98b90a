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

import fs from 'fs';
import { z as zod } from 'zod';
import { loggerFor } from '../logger';
import { toErrorMessage } from '../utils';
import { describeCount, IndexDescriptor, IndexState, isTerminal } from './migration-entities';
const L = loggerFor(__filename);
const fsPromises = fs.promises;

/**
 * Append-only record of state transitions. Cluster counts stay the authority,
 * the journal only tells the next run where an interrupted one stopped.
 */
export interface MigrationJournal {
	record(descriptor: IndexDescriptor): Promise<void>;
}

export const noopJournal: MigrationJournal = {
	record: async () => {},
};

const JournalEntry = zod.object({
	timestamp: zod.string(),
	index: zod.string(),
	state: zod.nativeEnum(IndexState),
	sourceCount: zod.string(),
	destCount: zod.string(),
});
export type JournalEntry = zod.infer<typeof JournalEntry>;

export const fileJournal = (path: string, now: () => Date = () => new Date()): MigrationJournal => ({
	record: async (descriptor: IndexDescriptor) => {
		const entry: JournalEntry = {
			timestamp: now().toISOString(),
			index: descriptor.name,
			state: descriptor.state,
			sourceCount: describeCount(descriptor.sourceCount),
			destCount: describeCount(descriptor.destCount),
		};
		try {
			await fsPromises.appendFile(path, JSON.stringify(entry) + '\n', 'utf-8');
		} catch (err) {
			L.error(`could not append to migration journal ${path}`, err);
		}
	},
});

export const parseJournal = (content: string): JournalEntry[] =>
	content
		.split('\n')
		.filter((line) => line.trim() !== '')
		.map((line) => {
			try {
				const parsed = JournalEntry.safeParse(JSON.parse(line));
				return parsed.success ? parsed.data : undefined;
			} catch (err) {
				return undefined;
			}
		})
		.filter((entry): entry is JournalEntry => entry !== undefined);

/**
 * Latest entry of every index whose last recorded state is not terminal.
 */
export const findInterrupted = (entries: ReadonlyArray<JournalEntry>): JournalEntry[] => {
	const latest = new Map<string, JournalEntry>();
	entries.forEach((entry) => latest.set(entry.index, entry));
	return Array.from(latest.values()).filter((entry) => !isTerminal(entry.state));
};

export const readInterrupted = async (path: string): Promise<JournalEntry[]> => {
	let content: string;
	try {
		content = await fsPromises.readFile(path, 'utf-8');
	} catch (err) {
		L.debug(`no migration journal read from ${path}: ${toErrorMessage(err)}`);
		return [];
	}
	return findInterrupted(parseJournal(content));
};
