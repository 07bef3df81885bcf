import fs from 'node:fs/promises';
import path from 'node:path';
import lockfile from 'proper-lockfile';

export type LockMode = 'shared' | 'exclusive';

type Release = () => Promise<void>;

interface Waiter {
  mode: LockMode;
  resolve: () => void;
}

const STALE_MS = 10_000;

/**
 * Create a directory with owner-only permissions. Tightening the mode of an
 * existing directory is best effort.
 */
export async function ensureDir(dir: string): Promise<void> {
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });
  try {
    await fs.chmod(dir, 0o700);
  } catch {
    // Some filesystems refuse chmod; the directory is still usable.
  }
}

async function touchLockFile(lockPath: string): Promise<void> {
  // Append mode: create if missing, never truncate.
  const handle = await fs.open(lockPath, 'a', 0o600);
  await handle.close();
}

/**
 * Directory proper-lockfile creates while the lock is held. Encoded topic
 * names never start with a dot, so this cannot collide with another
 * topic's data or lock file.
 */
export function mutexPath(lockPath: string): string {
  return path.join(
    path.dirname(lockPath),
    `.${path.basename(lockPath)}.mutex`,
  );
}

async function acquireFileLock(lockPath: string): Promise<Release> {
  return lockfile.lock(lockPath, {
    lockfilePath: mutexPath(lockPath),
    stale: STALE_MS,
    retries: {
      forever: true,
      factor: 1.5,
      minTimeout: 10,
      maxTimeout: 100,
      randomize: true,
    },
  });
}

async function releaseQuietly(release: Release): Promise<void> {
  try {
    await release();
  } catch {
    // Already released or compromised; nothing left to undo.
  }
}

/**
 * Readers/writer gate for one lock file within this process. Shared holders
 * run together and share one cross-process lock; an exclusive holder waits
 * for every other holder and takes its own. Waiters are served in arrival
 * order.
 */
class Gate {
  private readers = 0;
  private writer = false;
  private waiters: Waiter[] = [];
  private sharedLock: Promise<Release> | null = null;
  private sharedHolders = 0;

  constructor(private readonly lockPath: string) {}

  get idle(): boolean {
    return (
      this.readers === 0 &&
      !this.writer &&
      this.waiters.length === 0 &&
      this.sharedLock === null
    );
  }

  async enter(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.grant(mode);
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push({ mode, resolve });
    });
  }

  leave(mode: LockMode): void {
    if (mode === 'exclusive') {
      this.writer = false;
    } else {
      this.readers--;
    }
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) break;
      this.waiters.shift();
      this.grant(next.mode);
      next.resolve();
    }
  }

  async joinShared(): Promise<void> {
    if (this.sharedLock === null) {
      this.sharedLock = acquireFileLock(this.lockPath);
    }
    const pending = this.sharedLock;
    try {
      await pending;
    } catch (err) {
      if (this.sharedLock === pending) this.sharedLock = null;
      throw err;
    }
    this.sharedHolders++;
  }

  async leaveShared(): Promise<void> {
    this.sharedHolders--;
    if (this.sharedHolders > 0 || this.sharedLock === null) return;
    const held = this.sharedLock;
    this.sharedLock = null;
    await releaseQuietly(await held);
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'exclusive') return !this.writer && this.readers === 0;
    return !this.writer;
  }

  private grant(mode: LockMode): void {
    if (mode === 'exclusive') {
      this.writer = true;
    } else {
      this.readers++;
    }
  }
}

/**
 * Per-topic advisory locks backed by a dedicated lock file next to the data
 * file. The lock file is never replaced or removed, so the data file can be
 * swapped by rename while a lock is held.
 *
 * Shared holders only overlap within one process. proper-lockfile has no
 * shared mode, so shared holders in different processes take the
 * cross-process lock one after another.
 */
export class TopicLocks {
  private gates = new Map<string, Gate>();

  async withLock<T>(
    lockPath: string,
    mode: LockMode,
    body: () => Promise<T>,
  ): Promise<T> {
    await ensureDir(path.dirname(lockPath));
    await touchLockFile(lockPath);

    const gate = this.gateFor(lockPath);
    await gate.enter(mode);
    try {
      if (mode === 'exclusive') {
        const release = await acquireFileLock(lockPath);
        try {
          return await body();
        } finally {
          await releaseQuietly(release);
        }
      }

      await gate.joinShared();
      try {
        return await body();
      } finally {
        await gate.leaveShared();
      }
    } finally {
      gate.leave(mode);
      if (gate.idle) this.gates.delete(lockPath);
    }
  }

  private gateFor(lockPath: string): Gate {
    let gate = this.gates.get(lockPath);
    if (!gate) {
      gate = new Gate(lockPath);
      this.gates.set(lockPath, gate);
    }
    return gate;
  }
}
