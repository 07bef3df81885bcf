import { execFileSync } from 'node:child_process';

/** The current directory gives no way to name a topic. */
export class GitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GitError';
  }
}

/**
 * Run git and return stdout, or null when git fails or is missing.
 */
function gitOutput(args: string[], cwd: string): string | null {
  try {
    return execFileSync('git', args, {
      cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
    });
  } catch {
    return null;
  }
}

export function isInGitWorktree(cwd: string): boolean {
  const output = gitOutput(['rev-parse', '--is-inside-work-tree'], cwd);
  return output?.trim() === 'true';
}

/**
 * Name of the first configured remote, or '' when there is none.
 */
export function getFirstRemote(cwd: string): string {
  const output = gitOutput(['remote'], cwd);
  if (output === null) return '';
  const remotes = output
    .split('\n')
    .map((line) => line.trim())
    .filter(Boolean);
  return remotes[0] ?? '';
}

/**
 * Current branch name, or '' when HEAD is detached.
 */
export function getCurrentBranch(cwd: string): string {
  const output = gitOutput(['branch', '--show-current'], cwd);
  if (output === null) return '';
  const branch = output.trim();
  return branch === 'HEAD' ? '' : branch;
}

/**
 * Example: combineTopic('origin', 'main') => 'origin:main'
 */
export function combineTopic(remote: string, branch: string): string {
  if (remote && branch) return `${remote}:${branch}`;
  return remote || branch;
}

export function deriveTopic(cwd: string): string {
  if (!isInGitWorktree(cwd)) {
    throw new GitError('not in a git worktree (cannot derive topic)');
  }
  const topic = combineTopic(getFirstRemote(cwd), getCurrentBranch(cwd));
  if (!topic) {
    throw new GitError('cannot derive topic (no remote and no branch)');
  }
  return topic;
}
