import { promises as fs } from "node:fs";
import { LogWriteError, toErrorMessage } from "@/lib/rating/errors";
import { errorCode } from "@/lib/rating/guards";

export type FileLockOptions = {
  timeoutMs: number;
  staleMs: number;
  retryMs?: number;
};

const inProcess = new Map<string, Promise<void>>();

function sleep(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

let asideSeq = 0;

/**
 * Moves a stale lock aside under a unique name before deleting it, then checks
 * that the file moved is the one judged stale. If another writer re-created the
 * lock in between, that fresh lock is linked back into place.
 */
export async function removeIfStale(lockPath: string, staleMs: number) {
  const aside = `${lockPath}.${process.pid}.${++asideSeq}.stale`;
  try {
    const stat = await fs.stat(lockPath);
    if (Date.now() - stat.mtimeMs < staleMs) return false;
    await fs.rename(lockPath, aside);
    const moved = await fs.stat(aside);
    if (moved.ino !== stat.ino || moved.mtimeMs !== stat.mtimeMs) {
      await restoreLock(aside, lockPath);
      return false;
    }
    await fs.unlink(aside);
    console.warn(JSON.stringify({ level: "warn", event: "stale-lock-removed", lockPath, ageMs: Date.now() - stat.mtimeMs }));
    return true;
  } catch (e) {
    // Another writer released or moved it between our calls.
    if (errorCode(e) === "ENOENT") return true;
    throw e;
  }
}

async function restoreLock(aside: string, lockPath: string) {
  try {
    await fs.link(aside, lockPath);
  } catch (e) {
    if (errorCode(e) !== "EEXIST") throw e;
    console.warn(JSON.stringify({ level: "warn", event: "lock-restore-conflict", lockPath }));
  } finally {
    await fs.unlink(aside);
  }
}

async function acquire(lockPath: string, opts: FileLockOptions) {
  const deadline = Date.now() + opts.timeoutMs;
  const retryMs = opts.retryMs ?? 25;
  for (;;) {
    try {
      const fh = await fs.open(lockPath, "wx");
      await fh.writeFile(`${process.pid}\n`, "utf8");
      await fh.close();
      return;
    } catch (e) {
      if (errorCode(e) !== "EEXIST") {
        throw new LogWriteError(`Could not create lock ${lockPath}: ${toErrorMessage(e)}`, e);
      }
    }
    if (await removeIfStale(lockPath, opts.staleMs)) continue;
    if (Date.now() >= deadline) {
      throw new LogWriteError(`Timed out after ${opts.timeoutMs}ms waiting for lock ${lockPath}.`);
    }
    await sleep(retryMs);
  }
}

async function release(lockPath: string) {
  try {
    await fs.unlink(lockPath);
  } catch (e) {
    console.warn(JSON.stringify({ level: "warn", event: "lock-release-failed", lockPath, cause: toErrorMessage(e) }));
  }
}

/**
 * Runs `fn` while holding an exclusive lock on `target`. Callers in this
 * process queue on a promise chain; other processes are kept out by a
 * sibling `.lock` file created with O_EXCL.
 */
export async function withFileLock<T>(target: string, opts: FileLockOptions, fn: () => Promise<T>): Promise<T> {
  const lockPath = `${target}.lock`;
  const previous = inProcess.get(lockPath) ?? Promise.resolve();
  let done: () => void = () => undefined;
  const current = new Promise<void>((resolve) => {
    done = resolve;
  });
  const tail = previous.then(() => current);
  inProcess.set(lockPath, tail);

  try {
    await previous;
    await acquire(lockPath, opts);
    try {
      return await fn();
    } finally {
      await release(lockPath);
    }
  } finally {
    done();
    if (inProcess.get(lockPath) === tail) inProcess.delete(lockPath);
  }
}
