/**
 * Fixed allow/deny lists used by the path and command validators
 */

/**
 * Rejected only on exact match; subdirectories are judged by the allowed roots.
 */
export const FORBIDDEN_DIRECTORIES: readonly string[] = [
  '/root',
  '/etc',
  '/sys',
  '/proc',
  '/dev',
  '/boot',
  '/var/log',
  '/bin',
  '/sbin',
  '/usr/bin',
  '/usr/sbin'
];

/**
 * Roots (besides the user's home) under which a directory may be opened
 */
export const SHARED_ALLOWED_ROOTS: readonly string[] = [
  '/tmp',
  '/var/tmp',
  '/opt',
  '/usr/local',
  '/media',
  '/mnt'
];

export const DENIED_COMMANDS: ReadonlySet<string> = new Set([
  // shells and interpreters
  'bash', 'sh', 'zsh', 'dash', 'ksh', 'csh', 'tcsh', 'fish',
  'python', 'python3', 'perl', 'ruby', 'node',
  // privilege escalation
  'sudo', 'su', 'doas', 'pkexec',
  // filesystem destructive
  'rm', 'dd', 'mkfs', 'fdisk', 'shred', 'chmod', 'chown',
  // process and system control
  'kill', 'killall', 'pkill', 'shutdown', 'reboot', 'halt', 'poweroff', 'init',
  'systemctl', 'service',
  // remote fetch
  'wget', 'curl', 'nc', 'netcat'
]);

export const DENIED_COMMAND_PREFIXES: readonly string[] = ['rm', 'mkfs.'];

export const KNOWN_SAFE_EDITORS: readonly string[] = [
  'code', 'code-insiders', 'codium', 'vscodium',
  'vim', 'nvim', 'vi', 'nano', 'emacs', 'gedit', 'kate',
  'sublime_text', 'subl', 'atom', 'notepad++',
  'mousepad', 'pluma', 'xed', 'geany', 'brackets'
];

/**
 * Trailing separator keeps /usr/bin/x from matching /usr/binx
 */
export const SYSTEM_BINARY_DIRECTORIES: readonly string[] = [
  '/bin/',
  '/sbin/',
  '/usr/bin/',
  '/usr/sbin/',
  '/usr/local/bin/'
];

export const MAX_EXECUTABLE_SIZE_BYTES = 500 * 1024 * 1024;
