/**
 * PID marker file for the running daemon
 */

import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { RUNTIME_DIR_MODE } from '../constants/daemon-constants.js';

export class PidMarker {
	constructor(private readonly pidPath: string) {}

	getPath(): string {
		return this.pidPath;
	}

	/**
	 * Record `pid` (the current process by default)
	 */
	write(pid: number = process.pid): void {
		mkdirSync(dirname(this.pidPath), { recursive: true, mode: RUNTIME_DIR_MODE });
		const tmp = `${this.pidPath}.${pid}.tmp`;
		writeFileSync(tmp, `${pid}\n`, { mode: 0o600 });
		renameSync(tmp, this.pidPath);
	}

	/**
	 * Recorded PID, or null when the file is missing or unreadable
	 */
	read(): number | null {
		if (!existsSync(this.pidPath)) {
			return null;
		}
		const pid = Number.parseInt(readFileSync(this.pidPath, 'utf-8').trim(), 10);
		return Number.isInteger(pid) && pid > 0 ? pid : null;
	}

	/**
	 * Remove the file, but only while it still names `pid`
	 */
	remove(pid: number = process.pid): void {
		if (this.read() === pid) {
			rmSync(this.pidPath, { force: true });
		}
	}

	/**
	 * Recorded PID when that process is still alive
	 */
	readLive(): number | null {
		const pid = this.read();
		return pid !== null && isProcessAlive(pid) ? pid : null;
	}
}

export function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: exists but owned by someone else
		return error instanceof Error && 'code' in error && error.code === 'EPERM';
	}
}
