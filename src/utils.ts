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

import deepFreeze from 'deep-freeze';
import _ from 'lodash';

export namespace Errors {
	export class InvalidArgument extends Error {
		constructor(argumentName: string) {
			super(`Invalid argument : ${argumentName}`);
		}
	}

	export class InvalidConfiguration extends Error {
		constructor(msg: string) {
			super(`Invalid configuration : ${msg}`);
		}
	}

	export class InvalidStateTransition extends Error {
		constructor(index: string, from: string, to: string) {
			super(`Index ${index} cannot move from ${from} to ${to}`);
		}
	}

	// thrown instead of deleting a source index whose copy was not verified
	export class UnsafeDeletion extends Error {
		constructor(msg: string) {
			super(msg);
		}
	}
}

export namespace Checks {
	export const checkNotEmpty = (argName: string, arg: string | undefined) => {
		if (!isNotEmptyString(arg)) {
			throw new Errors.InvalidArgument(argName);
		}
	};
}

export const isNotEmptyString = (value: string | undefined): value is string => {
	return value !== null && value !== undefined && value.trim() !== '';
};

export const sleep = async (milliSeconds: number = 2000) => {
	return new Promise<void>((resolve) => setTimeout(resolve, milliSeconds));
};

// pads a date part the way index date suffixes are written: 2024.01.05
export const toIndexDateSuffix = (date: Date) => {
	const pad = (n: number) => _.padStart(`${n}`, 2, '0');
	return `${date.getUTCFullYear()}.${pad(date.getUTCMonth() + 1)}.${pad(date.getUTCDate())}`;
};

export const toErrorMessage = (err: unknown): string => {
	if (err instanceof Error) {
		return err.message;
	}
	return `${err}`;
};

export const F = deepFreeze;
