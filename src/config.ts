import os from 'os';

// Persisted label -> mount directory registry, shared system-wide.
export const MOUNT_REGISTRY_PATH =
  process.env.SWI_MOUNT_REGISTRY || '/etc/mtab.yml';

export const PROC_MOUNTS_PATH = process.env.SWI_PROC_MOUNTS || '/proc/mounts';

// Temporary mountpoints and downloaded images are created under here
export const TMP_DIR = process.env.SWI_TMP_DIR || os.tmpdir();

// sshpass -e reads the password from this variable
export const SSH_PASSWORD_ENV = 'SSHPASS';

export const TFTP_DEFAULT_PORT = 69;

export const SWI_SUFFIX = '.swi';
export const LATEST_TOKEN = ':latest';

// 4Hz cap on terminal progress updates
export const PROGRESS_INTERVAL_MS = 250;

export const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
