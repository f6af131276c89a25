import type { Stats } from "node:fs";
import { cp, lstat, mkdir, readdir, readlink, rename, rm, symlink } from "node:fs/promises";
import path from "node:path";
import { nanoid } from "nanoid";

/**
 * Persistent base that accepted candidates replace.
 */
export interface BaseStore {
  /** Makes the candidate the current base; returns the new version path. */
  promote(candidatePath: string, candidateId: string): Promise<string>;
  /** Removes a candidate whether or not it was promoted. */
  discard(candidatePath: string): Promise<void>;
  /** Path the base currently resolves to, or null when there is none. */
  current(): Promise<string | null>;
}

export interface FsBaseStoreOptions {
  basePath: string;
  /** Versions retained, the current one included. */
  keepVersions?: number;
}

const VERSION_PATTERN = /^v(\d{6,})-/;
const INITIAL_VERSION = "v000000-initial";

function isErrnoException(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function lstatOrNull(target: string): Promise<Stats | null> {
  try {
    return await lstat(target);
  } catch (error) {
    if (isErrnoException(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

function versionSequence(name: string): number | null {
  const match = VERSION_PATTERN.exec(name);
  return match ? Number(match[1]) : null;
}

/** True when `target` lies strictly below `dir`. */
export function isInsideDirectory(dir: string, target: string): boolean {
  const relative = path.relative(path.resolve(dir), path.resolve(target));
  return relative.length > 0 && relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}

function sanitizeId(candidateId: string): string {
  const cleaned = candidateId.replace(/[^A-Za-z0-9._-]+/g, "_").slice(0, 64);
  return cleaned.length ? cleaned : "candidate";
}

/**
 * Directory base published through a symlink. `<base>` points at
 * `<base>.versions/<version>`; promotion stages the candidate as a new
 * version and renames a fresh link over `<base>`, so readers see either
 * the old or the new version and never a partial one.
 */
export class FsBaseStore implements BaseStore {
  private readonly basePath: string;
  private readonly versionsDir: string;
  private readonly keepVersions: number;

  constructor(options: FsBaseStoreOptions) {
    this.basePath = path.resolve(options.basePath);
    this.versionsDir = `${this.basePath}.versions`;
    this.keepVersions = Math.max(1, options.keepVersions ?? 3);
  }

  async current(): Promise<string | null> {
    const info = await lstatOrNull(this.basePath);
    if (!info) {
      return null;
    }
    if (info.isSymbolicLink()) {
      return path.resolve(path.dirname(this.basePath), await readlink(this.basePath));
    }
    return this.basePath;
  }

  /** Adopts a plain base directory before any candidate is evaluated. */
  async prepare(): Promise<void> {
    await mkdir(this.versionsDir, { recursive: true });
    await this.adoptExistingBase();
  }

  async promote(candidatePath: string, candidateId: string): Promise<string> {
    this.assertOutsideBase(candidatePath);
    await this.prepare();

    const sequence = (await this.listVersions()).reduce((max, version) => Math.max(max, version.sequence), 0) + 1;
    const versionName = `v${String(sequence).padStart(6, "0")}-${sanitizeId(candidateId)}`;
    const versionPath = path.join(this.versionsDir, versionName);
    await this.stage(path.resolve(candidatePath), versionPath);

    const tempLink = `${this.basePath}.link-${nanoid(8)}`;
    await symlink(versionPath, tempLink, "dir");
    try {
      await rename(tempLink, this.basePath);
    } catch (error) {
      await rm(tempLink, { force: true });
      throw error;
    }

    await this.prune(versionName);
    return versionPath;
  }

  async discard(candidatePath: string): Promise<void> {
    this.assertOutsideBase(candidatePath);
    await rm(path.resolve(candidatePath), { recursive: true, force: true });
  }

  /** The base, its versions and their ancestors are never candidates. */
  private assertOutsideBase(candidatePath: string): void {
    const target = path.resolve(candidatePath);
    for (const owned of [this.basePath, this.versionsDir]) {
      if (target === owned || isInsideDirectory(target, owned) || isInsideDirectory(owned, target)) {
        throw new Error(`Candidate ${target} overlaps base storage ${owned}`);
      }
    }
  }

  private async stage(candidatePath: string, versionPath: string): Promise<void> {
    try {
      await rename(candidatePath, versionPath);
    } catch (error) {
      if (!isErrnoException(error, "EXDEV")) {
        throw error;
      }
      await cp(candidatePath, versionPath, { recursive: true });
    }
  }

  /** A real directory at the base path becomes the first version. */
  private async adoptExistingBase(): Promise<void> {
    const info = await lstatOrNull(this.basePath);
    if (!info || info.isSymbolicLink()) {
      return;
    }
    if (!info.isDirectory()) {
      throw new Error(`Base path ${this.basePath} exists and is not a directory`);
    }
    // A link cannot be renamed over a directory; staging it first keeps
    // the window to two back-to-back renames.
    const initialPath = path.join(this.versionsDir, INITIAL_VERSION);
    const tempLink = `${this.basePath}.link-${nanoid(8)}`;
    await symlink(initialPath, tempLink, "dir");
    try {
      await rename(this.basePath, initialPath);
    } catch (error) {
      await rm(tempLink, { force: true });
      throw error;
    }
    await rename(tempLink, this.basePath);
  }

  private async listVersions(): Promise<Array<{ name: string; sequence: number }>> {
    const entries = await readdir(this.versionsDir);
    return entries.flatMap(name => {
      const sequence = versionSequence(name);
      return sequence === null ? [] : [{ name, sequence }];
    });
  }

  private async prune(currentVersion: string): Promise<void> {
    const versions = (await this.listVersions()).sort((a, b) => b.sequence - a.sequence);
    const stale = versions.slice(this.keepVersions).filter(version => version.name !== currentVersion);
    await Promise.all(stale.map(version => rm(path.join(this.versionsDir, version.name), { recursive: true, force: true })));
  }
}
