import type { PrivilegeContext, ResourceContext } from '@provision/types';

/**
 * Locate an executable: PATH first, then each extra directory.
 * Returns null when it is nowhere to be found.
 */
export async function resolveBinary(
  context: ResourceContext,
  name: string,
  extraDirs: readonly string[] = []
): Promise<string | null> {
  const which = await context.runner.invoke(['which', name]);
  if (which.exitCode === 0) {
    const path = which.stdout.trim().split('\n')[0];
    if (path) return path;
  }

  for (const dir of extraDirs) {
    const candidate = `${dir.replace(/\/+$/, '')}/${name}`;
    const test = await context.runner.invoke(['test', '-x', candidate]);
    if (test.exitCode === 0) return candidate;
  }

  return null;
}

/**
 * Go installs binaries into $GOPATH/bin, which is rarely on root's PATH.
 */
export function goBinDir(privilege: PrivilegeContext): string {
  return `${privilege.home}/go/bin`;
}

/** Default Homebrew prefixes (Apple silicon, Intel) */
export const HOMEBREW_BIN_DIRS = ['/opt/homebrew/bin', '/usr/local/bin'] as const;

export function findBrew(context: ResourceContext): Promise<string | null> {
  return resolveBinary(context, 'brew', HOMEBREW_BIN_DIRS);
}
