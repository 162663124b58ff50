import path from 'path';
import type { BacklogFileSystem } from '../fs/fileSystem';
import { TOPIC_BRIEF_FILE, type TrackedFile } from '../fs/enumerate';
import { RecordParseError } from '../errors';
import type { ItemRecord, ItemType, SourceKind } from '../types';
import { parseFrontmatter } from './frontmatter';

const READ_FAILURE = 'Failed to open file';
const DEFAULT_TITLE = '(untitled)';
const DEFAULT_STATE = 'Proposed';
const DEFAULT_MANIFEST_STATUS = 'open';

// keyed by the directory two levels above an item file, e.g. items/story/0001/US-1.md
const TYPE_BY_FOLDER: Record<string, ItemType> = {
  story: 'UserStory',
  userstory: 'UserStory',
  epic: 'Epic',
  feature: 'Feature',
  task: 'Task',
  bug: 'Bug',
};

function emptyRecord(sourceKind: SourceKind, relativePath: string, type: ItemRecord['type'] = ''): ItemRecord {
  return {
    id: '',
    type,
    sourceKind,
    title: '',
    state: '',
    parent: '',
    created: '',
    updated: '',
    relativePath,
    rawContent: '',
    valid: false,
  };
}

function invalid(record: ItemRecord, parseError: string): ItemRecord {
  return { ...record, valid: false, parseError };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function readText(fs: BacklogFileSystem, filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath);
  } catch {
    throw new RecordParseError('file_unreadable', READ_FAILURE);
  }
}

export function inferTypeFromPath(itemPath: string, declaredType: string): ItemRecord['type'] {
  if (declaredType) return declaredType;
  const folder = path.basename(path.dirname(path.dirname(itemPath)));
  return TYPE_BY_FOLDER[folder] ?? 'Unknown';
}

export async function buildItemRecord(fs: BacklogFileSystem, file: TrackedFile): Promise<ItemRecord> {
  const base = emptyRecord('Item', file.relativePath);
  let content: string;
  try {
    content = await readText(fs, file.path);
  } catch (err) {
    return invalid(base, errorMessage(err));
  }

  const withContent = { ...base, rawContent: content };
  let fm: Record<string, string>;
  try {
    fm = parseFrontmatter(content);
  } catch (err) {
    return invalid(withContent, errorMessage(err));
  }

  const record: ItemRecord = {
    ...withContent,
    id: fm.id ?? '',
    type: inferTypeFromPath(file.path, fm.type ?? ''),
    title: fm.title ?? '',
    state: fm.state ?? '',
    parent: fm.parent ?? '',
    created: fm.created ?? '',
    updated: fm.updated ?? '',
  };

  if (!record.id) return invalid(record, 'Missing id');
  if (record.id.toLowerCase() === 'null') return invalid(record, 'Invalid id');

  return {
    ...record,
    title: record.title || DEFAULT_TITLE,
    state: record.state || DEFAULT_STATE,
    valid: true,
  };
}

export async function buildDecisionRecord(fs: BacklogFileSystem, file: TrackedFile): Promise<ItemRecord> {
  const base = emptyRecord('Decision', file.relativePath, 'ADR');
  let content: string;
  try {
    content = await readText(fs, file.path);
  } catch (err) {
    return invalid(base, errorMessage(err));
  }

  const withContent = { ...base, rawContent: content };
  let fm: Record<string, string>;
  try {
    fm = parseFrontmatter(content);
  } catch (err) {
    return invalid(withContent, errorMessage(err));
  }

  const stem = path.basename(file.path, path.extname(file.path));
  return {
    ...withContent,
    id: fm.id || stem,
    title: fm.title || stem,
    state: fm.status || DEFAULT_STATE,
    created: fm.date ?? '',
    updated: fm.date ?? '',
    valid: true,
  };
}

type Manifest = Record<string, unknown>;

async function readManifest(fs: BacklogFileSystem, manifestPath: string): Promise<{ text: string; manifest: Manifest }> {
  const text = await readText(fs, manifestPath);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new RecordParseError('malformed_manifest', errorMessage(err));
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new RecordParseError('malformed_manifest', 'Manifest must be a JSON object');
  }
  return { text, manifest: { ...parsed } };
}

function manifestString(manifest: Manifest, key: string, fallback: string): string {
  const value = manifest[key];
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return fallback;
}

interface ManifestShape {
  sourceKind: Extract<SourceKind, 'Topic' | 'Workset'>;
  idPrefix: string;
  nameKey: string;
}

async function buildManifestRecord(
  fs: BacklogFileSystem,
  file: TrackedFile,
  shape: ManifestShape,
): Promise<ItemRecord> {
  const base = emptyRecord(shape.sourceKind, file.relativePath, shape.sourceKind);
  let loaded: { text: string; manifest: Manifest };
  try {
    loaded = await readManifest(fs, file.path);
  } catch (err) {
    return invalid(base, errorMessage(err));
  }

  const { manifest, text } = loaded;
  const dirName = path.basename(path.dirname(file.path));
  const name = manifestString(manifest, shape.nameKey, dirName);
  return {
    ...base,
    id: `${shape.idPrefix}${name}`,
    title: name,
    state: manifestString(manifest, 'status', DEFAULT_MANIFEST_STATUS),
    created: manifestString(manifest, 'created_at', ''),
    updated: manifestString(manifest, 'updated_at', ''),
    rawContent: text,
    valid: true,
  };
}

export async function buildTopicRecord(fs: BacklogFileSystem, file: TrackedFile): Promise<ItemRecord> {
  const record = await buildManifestRecord(fs, file, {
    sourceKind: 'Topic',
    idPrefix: 'TOPIC-',
    nameKey: 'topic',
  });
  if (!record.valid) return record;

  const briefPath = path.join(path.dirname(file.path), TOPIC_BRIEF_FILE);
  try {
    const brief = await fs.stat(briefPath);
    if (!brief?.isFile) return record;
    return { ...record, rawContent: await fs.readFile(briefPath) };
  } catch {
    // unreadable brief: the manifest text already stands in
    return record;
  }
}

export async function buildWorksetRecord(fs: BacklogFileSystem, file: TrackedFile): Promise<ItemRecord> {
  return buildManifestRecord(fs, file, {
    sourceKind: 'Workset',
    idPrefix: 'WORKSET-',
    nameKey: 'name',
  });
}

export function buildRecord(fs: BacklogFileSystem, file: TrackedFile): Promise<ItemRecord> {
  switch (file.kind) {
    case 'item':
      return buildItemRecord(fs, file);
    case 'decision':
      return buildDecisionRecord(fs, file);
    case 'topic':
      return buildTopicRecord(fs, file);
    case 'workset':
      return buildWorksetRecord(fs, file);
  }
}
