import { execFileSync } from 'child_process';
import { readFileSync } from 'fs';
import { homedir, userInfo } from 'os';
import type { PrivilegeContext } from '@provision/types';

/**
 * Inputs for privilege detection, injectable for tests.
 */
export interface PrivilegeSource {
  env: NodeJS.ProcessEnv;
  /** Effective uid; undefined on platforms without POSIX ids */
  uid: number | undefined;
  platform: NodeJS.Platform;
  homedir: string;
  /** Home directory in the account record of the effective user */
  accountHome: string;
  /** Home directory in another user's account record, if it can be read */
  lookupHome(user: string): string | undefined;
}

function currentSource(): PrivilegeSource {
  return {
    env: process.env,
    uid: typeof process.geteuid === 'function' ? process.geteuid() : undefined,
    platform: process.platform,
    homedir: homedir(),
    accountHome: accountHomeOfCurrentUser(),
    lookupHome: user => lookupAccountHome(user, process.platform),
  };
}

/**
 * Work out who we are running for.
 *
 * Under sudo the effective uid is 0 but the real user is SUDO_USER; user-level
 * commands (Homebrew, go install) must run as that user and ~ must expand to
 * their home, not root's. sudo on macOS keeps HOME, so a HOME that differs
 * from root's own account home is taken as the real user's; otherwise the
 * real user's account record is read.
 */
export function detectPrivilegeContext(source: PrivilegeSource = currentSource()): PrivilegeContext {
  const uid = source.uid ?? -1;
  const sudoUser = source.env.SUDO_USER;

  if (sudoUser && sudoUser !== 'root') {
    const keptHome = source.env.HOME && source.env.HOME !== source.accountHome ? source.env.HOME : undefined;
    const home = keptHome ?? source.lookupHome(sudoUser) ?? guessHome(sudoUser, source.platform);
    return { uid, user: sudoUser, home, elevated: uid === 0 };
  }

  return {
    uid,
    user: source.env.USER ?? source.env.LOGNAME ?? '',
    home: source.env.HOME ?? source.homedir,
    elevated: uid === 0,
  };
}

function guessHome(user: string, platform: NodeJS.Platform): string {
  return `${platform === 'darwin' ? '/Users' : '/home'}/${user}`;
}

function accountHomeOfCurrentUser(): string {
  try {
    return userInfo().homedir;
  } catch {
    // No passwd entry for the effective uid
    return homedir();
  }
}

/**
 * Read a user's home from the directory service (macOS) or /etc/passwd.
 * Undefined when the record cannot be read.
 */
function lookupAccountHome(user: string, platform: NodeJS.Platform): string | undefined {
  try {
    if (platform === 'darwin') {
      const output = execFileSync('dscl', ['.', '-read', `/Users/${user}`, 'NFSHomeDirectory'], {
        encoding: 'utf-8',
        stdio: ['ignore', 'pipe', 'ignore'],
      });
      return parseDsclHome(output);
    }
    return parsePasswdHome(readFileSync('/etc/passwd', 'utf-8'), user);
  } catch {
    // Unknown user or unreadable record; the caller falls back
    return undefined;
  }
}

/** `NFSHomeDirectory: /Users/alice` */
export function parseDsclHome(output: string): string | undefined {
  const match = /^NFSHomeDirectory:\s*(\S.*?)\s*$/m.exec(output);
  return match?.[1];
}

/** `name:pw:uid:gid:gecos:home:shell`, one account per line */
export function parsePasswdHome(content: string, user: string): string | undefined {
  for (const line of content.split('\n')) {
    const fields = line.split(':');
    if (fields[0] === user && fields.length >= 7 && fields[5]) return fields[5];
  }
  return undefined;
}

/**
 * Prefix argv so it runs as the real (non-root) user when we are elevated
 * under sudo. Without elevation the command already runs as that user.
 */
export function asRealUser(privilege: PrivilegeContext, argv: readonly string[]): string[] {
  if (privilege.elevated && privilege.user && privilege.user !== 'root') {
    return ['sudo', '-u', privilege.user, '-H', ...argv];
  }
  return [...argv];
}

/**
 * Expand a leading `~/` against the real user's home.
 */
export function expandHome(path: string, home: string): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return `${home}${path.slice(1)}`;
  return path;
}
