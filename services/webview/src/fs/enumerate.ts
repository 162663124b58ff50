import path from 'path';
import { isDirectory, type BacklogFileSystem, type DirEntry, type FileStat } from './fileSystem';

export type TrackedKind = 'item' | 'decision' | 'topic' | 'workset';

export interface TrackedFile {
  kind: TrackedKind;
  /** Absolute path of the markdown file or manifest. */
  path: string;
  relativePath: string;
  /** For topics this also covers the companion brief. */
  mtimeMs: number;
}

export interface ProductLayout {
  productRoot: string;
  workspaceRoot: string;
}

export const MARKDOWN_EXT = '.md';
export const MANIFEST_FILE = 'manifest.json';
export const TOPIC_BRIEF_FILE = 'brief.md';
const TRASH_DIR = '_trash';

// an entry whose stat fails is still tracked, so its builder reports the read failure
const UNREADABLE: FileStat = { isDirectory: false, isFile: true, mtimeMs: 0 };

export function shouldSkipPath(filePath: string): boolean {
  const name = path.basename(filePath);
  if (name === 'README.md' || name.endsWith('.index.md')) return true;
  return filePath.split(/[\\/]/).includes(TRASH_DIR);
}

export function isMarkdownFile(filePath: string): boolean {
  return path.extname(filePath) === MARKDOWN_EXT;
}

export function toRelativePath(root: string, filePath: string): string {
  return path.relative(root, filePath).split(path.sep).join('/');
}

export function itemsDirectory(layout: ProductLayout): string {
  return path.join(layout.productRoot, 'items');
}

/**
 * Lists every file the loader reads for one product, in load order:
 * items, decisions, topic manifests, workset manifests.
 * Missing directories yield nothing.
 */
export async function enumerateTrackedFiles(
  fs: BacklogFileSystem,
  layout: ProductLayout,
): Promise<TrackedFile[]> {
  const { productRoot, workspaceRoot } = layout;
  return [
    ...(await walkMarkdown(fs, 'item', itemsDirectory(layout), productRoot)),
    ...(await walkMarkdown(fs, 'decision', path.join(productRoot, 'decisions'), productRoot)),
    ...(await listManifests(fs, 'topic', path.join(workspaceRoot, 'topics'), workspaceRoot)),
    ...(await listManifests(fs, 'workset', path.join(workspaceRoot, 'worksets'), workspaceRoot)),
  ];
}

export function latestMtimeOf(files: TrackedFile[]): number | null {
  let latest: number | null = null;
  for (const file of files) {
    if (latest === null || file.mtimeMs > latest) latest = file.mtimeMs;
  }
  return latest;
}

function tracked(kind: TrackedKind, filePath: string, root: string, mtimeMs: number): TrackedFile {
  return { kind, path: filePath, relativePath: toRelativePath(root, filePath), mtimeMs };
}

async function readEntries(fs: BacklogFileSystem, dir: string): Promise<DirEntry[] | null> {
  try {
    return sortByName(await fs.readdir(dir));
  } catch {
    return null;
  }
}

async function statEntry(fs: BacklogFileSystem, entryPath: string): Promise<FileStat | null> {
  try {
    return await fs.stat(entryPath);
  } catch {
    return UNREADABLE;
  }
}

async function walkMarkdown(
  fs: BacklogFileSystem,
  kind: TrackedKind,
  dir: string,
  root: string,
): Promise<TrackedFile[]> {
  if (!(await isDirectory(fs, dir))) return [];
  return walkDirectory(fs, kind, dir, root);
}

// symlinked files are followed; symlinked directories are not descended into
async function walkDirectory(
  fs: BacklogFileSystem,
  kind: TrackedKind,
  dir: string,
  root: string,
): Promise<TrackedFile[]> {
  const entries = await readEntries(fs, dir);
  // unlistable directory: tracked as one entry so the scan warns about it
  if (!entries) return [tracked(kind, dir, root, 0)];

  const out: TrackedFile[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory) {
      out.push(...(await walkDirectory(fs, kind, full, root)));
      continue;
    }
    if (!(entry.isFile || entry.isSymbolicLink) || !isMarkdownFile(full) || shouldSkipPath(full)) continue;

    const st = await statEntry(fs, full);
    if (!st?.isFile) continue; // removed mid-scan, dangling link or link to a directory
    out.push(tracked(kind, full, root, st.mtimeMs));
  }
  return out;
}

async function listManifests(
  fs: BacklogFileSystem,
  kind: TrackedKind,
  dir: string,
  root: string,
): Promise<TrackedFile[]> {
  if (!(await isDirectory(fs, dir))) return [];

  const out: TrackedFile[] = [];
  for (const entry of (await readEntries(fs, dir)) ?? []) {
    const entryDir = path.join(dir, entry.name);
    if (!entry.isDirectory && !(entry.isSymbolicLink && (await isDirectory(fs, entryDir)))) continue;
    const manifestPath = path.join(entryDir, MANIFEST_FILE);
    if (shouldSkipPath(manifestPath)) continue;

    const st = await statEntry(fs, manifestPath);
    if (!st?.isFile) continue;

    let mtimeMs = st.mtimeMs;
    if (kind === 'topic') {
      const brief = await statEntry(fs, path.join(entryDir, TOPIC_BRIEF_FILE));
      if (brief?.isFile && brief.mtimeMs > mtimeMs) mtimeMs = brief.mtimeMs;
    }
    out.push(tracked(kind, manifestPath, root, mtimeMs));
  }
  return out;
}

function sortByName<T extends { name: string }>(entries: T[]): T[] {
  return [...entries].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
