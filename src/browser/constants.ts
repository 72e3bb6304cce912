export const DEFAULT_DEBUG_HOST = '127.0.0.1';
// Debug ports are drawn from [33000, 43000) unless one is configured.
export const DEBUG_PORT_RANGE_START = 33_000;
export const DEBUG_PORT_RANGE_SIZE = 10_000;

export const DEFAULT_HTML_FILE = 'index.html';
export const DEFAULT_TEST_DIRECTORY = 'test';

export const DEFAULT_TAB_TIMEOUT_MS = 5_000;
export const TAB_POLL_INTERVAL_MS = 250;
export const DEFAULT_IDLE_TIMEOUT_MS = 60_000;
export const PROCESS_EXIT_GRACE_MS = 5_000;

// Harness sentinel lines: 'tests finished - passed' or 'tests finished - failed'.
export const TESTS_FINISHED_MARKER = 'tests finished -';
export const TESTS_FAILED_MARKER = 'tests finished - failed';

export const PROFILE_DIR_PREFIX = 'webharness-profile-';

export const BASE_LAUNCH_FLAGS = ['--no-default-browser-check', '--no-first-run'] as const;
export const VERBOSE_LAUNCH_FLAGS = ['--enable-logging=stderr', '--v=1'] as const;

export const CHROME_ARGS_ENV = 'CHROME_ARGS';
export const DEBUG_PORT_ENV = 'WEBHARNESS_DEBUG_PORT';
