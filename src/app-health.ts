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

import { ClusterClient } from './cluster/cluster-client';
import { ClusterRole } from './config';
import { loggerFor } from './logger';
const L = loggerFor(__filename);

export type AppHealth = {
	all: ComponentStatus;
} & Record<ClusterRole, ComponentStatus>;

// source: https://unicode.org/Public/emoji/12.0/emoji-test.txt
export enum Status {
	OK = '😇',
	UNKNOWN = '🤔',
	ERROR = '😱',
}

export type ComponentStatus = {
	status: Status;
	statusText?: 'OK' | 'N/A' | 'ERROR';
	info?: Record<string, string>;
};

const unknownStatus = (): ComponentStatus => ({ status: Status.UNKNOWN, statusText: 'N/A' });

const health: AppHealth = {
	all: unknownStatus(),
	source: unknownStatus(),
	destination: unknownStatus(),
};

const statusText = (status: Status): ComponentStatus['statusText'] => {
	switch (status) {
		case Status.OK:
			return 'OK';
		case Status.ERROR:
			return 'ERROR';
		case Status.UNKNOWN:
			return 'N/A';
	}
};

export function setStatus(component: ClusterRole, status: ComponentStatus) {
	health[component] = { ...status, statusText: statusText(status.status) };
	const components: ClusterRole[] = ['source', 'destination'];
	const overall = components.some((key) => health[key].status === Status.ERROR)
		? Status.ERROR
		: components.some((key) => health[key].status === Status.UNKNOWN)
		? Status.UNKNOWN
		: Status.OK;
	health.all = { status: overall, statusText: statusText(overall) };
}

export function getHealth(): AppHealth {
	return health;
}

export const checkClusterHealth = async (client: ClusterClient) => {
	const result = await client.ping();
	if (!result.success) {
		L.error(`${client.role} cluster ${client.url} is not reachable: ${result.message}`);
		setStatus(client.role, { status: Status.ERROR, info: { error: result.message } });
		return false;
	}
	L.info(
		`${client.role} cluster ${client.url} is up: ${result.data.clusterName} ${result.data.version}`,
	);
	setStatus(client.role, {
		status: Status.OK,
		info: { clusterName: result.data.clusterName, version: result.data.version },
	});
	return true;
};
