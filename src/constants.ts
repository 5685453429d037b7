/** Exit code: configuration or validation error (bad sink config, unknown output module, etc.). */
export const EXIT_CONFIG = 1;
/** Exit code: runtime fatal error (sink open failed, lane startup failed, or error during stop). */
export const EXIT_RUNTIME = 2;

export const MODULE_NAME = 'JsonFlowstartLog';
/** Registration key of the standalone packet-logger module. */
export const FLOWSTART_CONF_NAME = 'flow_start-json-log';
/** Parent multiplexing output that the sub-module nests under. */
export const EVE_PARENT_NAME = 'eve-log';
export const FLOWSTART_SUB_CONF_NAME = `${EVE_PARENT_NAME}.flow_start`;
export const FLOWSTART_EVENT_TYPE = 'flow_start';

/** Logger id in the host's packet-logger table. */
export const LOGGER_JSON_FLOWSTART = 'LOGGER_JSON_FLOWSTART';

export const DEFAULT_LOG_FILENAME = 'flowstart.json';
export const DEFAULT_EVE_FILENAME = 'eve.json';

/** Initial capacity of each lane's scratch buffer, in bytes. */
export const OUTPUT_BUFFER_SIZE = 65_535;

/**
 * Defaults applied to a sink configuration node before opening.
 * The log directory is the host's default-log-dir; relative filenames resolve against it.
 */
export const SINK_DEFAULTS = {
  logDir: '.',
  filetype: 'regular',
  append: true,
  filemode: 0o640,
} as const;

export const ROTATE_INTERVAL_NAMES: Readonly<Record<string, number>> = {
  minute: 60,
  hour: 3_600,
  day: 86_400,
};

/** Minimum gap between sysfs rescans triggered by an unknown interface index. */
export const INTERFACE_RESCAN_INTERVAL_MS = 60_000;
