/**
 * Constants and default values for the daemon process
 *
 * @module daemon-constants
 */

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;
export const DEFAULT_SHUTDOWN_GRACE_MS = 3000;

/**
 * Largest accepted request frame; larger frames are rejected and the
 * connection is closed
 */
export const MAX_FRAME_BYTES = 1024 * 1024;

export const SOCKET_MODE = 0o600;
export const RUNTIME_DIR_MODE = 0o700;

/**
 * How long a client waits for the socket before giving up
 */
export const CLIENT_CONNECT_TIMEOUT_MS = 1000;

/**
 * Retention defaults
 */
export const DEFAULT_RETENTION_DAYS = 90;
export const RETENTION_INTERVAL_MS = 6 * 60 * 60 * 1000;
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Index coordinator defaults
 */
export const DEFAULT_INDEX_BATCH_SIZE = 32;
export const DEFAULT_FLUSH_INTERVAL_MS = 2000;
export const BOOTSTRAP_COMMAND_LIMIT = 5000;

/**
 * Directories whose commands are never recorded
 */
export const DEFAULT_EXCLUDED_PATHS: readonly string[] = ['~/.ssh', '~/.gnupg', '~/.password-store'];

/**
 * Case-insensitive patterns whose commands are never recorded
 */
export const DEFAULT_EXCLUDED_PATTERNS: readonly string[] = [
	'password',
	'token',
	'secret',
	'api[_-]?key',
	'aws[_-]?access',
];

/**
 * Patterns longer than this are ignored
 */
export const MAX_PATTERN_LENGTH = 1000;
