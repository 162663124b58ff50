import { readdir, readFile, realpath, stat } from 'fs/promises';

export interface DirEntry {
  name: string;
  isDirectory: boolean;
  isFile: boolean;
  /** Symlinks report neither of the flags above; callers stat them to follow. */
  isSymbolicLink: boolean;
}

export interface FileStat {
  isDirectory: boolean;
  isFile: boolean;
  mtimeMs: number;
}

/**
 * The slice of the filesystem the backlog loader needs.
 * Everything above this interface works on plain paths, so tests can wrap or replace it.
 */
export interface BacklogFileSystem {
  readdir(dir: string): Promise<DirEntry[]>;
  /** Resolves to `null` when the path does not exist. */
  stat(path: string): Promise<FileStat | null>;
  readFile(path: string): Promise<string>;
  realpath(path: string): Promise<string>;
}

export class NodeFileSystem implements BacklogFileSystem {
  async readdir(dir: string): Promise<DirEntry[]> {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries.map((entry) => ({
      name: entry.name,
      isDirectory: entry.isDirectory(),
      isFile: entry.isFile(),
      isSymbolicLink: entry.isSymbolicLink(),
    }));
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const st = await stat(path);
      return { isDirectory: st.isDirectory(), isFile: st.isFile(), mtimeMs: st.mtimeMs };
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
  }

  async readFile(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async realpath(path: string): Promise<string> {
    return realpath(path);
  }
}

function isMissing(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  return err.code === 'ENOENT' || err.code === 'ENOTDIR';
}

/** Follows symlinks. False for missing paths and for paths that cannot be stat'ed. */
export async function isDirectory(fs: BacklogFileSystem, path: string): Promise<boolean> {
  try {
    const st = await fs.stat(path);
    return st?.isDirectory ?? false;
  } catch {
    return false;
  }
}

export const nodeFileSystem = new NodeFileSystem();
