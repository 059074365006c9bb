/** Well-known paths mounted into every step container. */
export const MOUNT_ROOT = '/stepcoord';

export const DEFAULT_PATHS = {
  stepsDir: `${MOUNT_ROOT}/steps`,
  resultsDir: `${MOUNT_ROOT}/results`,
  scriptsDir: `${MOUNT_ROOT}/scripts`,
  cancelFile: `${MOUNT_ROOT}/downward/cancel`,
  terminationPath: '/dev/termination-log',
  taskArtifactsPath: `${MOUNT_ROOT}/artifacts/provenance.json`,
} as const;

export const STEP_CONTAINER_PREFIX = 'step-';

export const ARTIFACTS_DIR = 'artifacts';
export const ARTIFACTS_MANIFEST = 'provenance.json';
export const EXIT_CODE_FILE = 'exitCode';
export const DEBUG_BEFORE_STEP_FILE = '.beforestepexit';
export const BREAKPOINT_EXIT_SUFFIX = '.breakpointexit';
export const ERROR_SUFFIX = '.err';

/** Kubernetes caps a container termination message at 4 KiB. */
export const MAX_TERMINATION_MESSAGE_BYTES = 4096;

export const DEFAULT_WAIT_POLL_INTERVAL_MS = 1000;

export function containerNameFor(stepName: string): string {
  return `${STEP_CONTAINER_PREFIX}${stepName}`;
}
