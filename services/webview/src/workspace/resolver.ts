import path from 'path';
import { BacklogError } from '../errors';
import { isDirectory, nodeFileSystem, type BacklogFileSystem } from '../fs/fileSystem';
import type { WorkspaceInfo } from '../contracts/backlogService';

export const PRODUCTS_DIR = 'products';
const NESTED_PRODUCTS = path.join('_kano', 'backlog', PRODUCTS_DIR);

export const WORKSPACE_NOT_FOUND_MESSAGE =
  'Path does not contain a backlog products directory (expected products/ or _kano/backlog/products/)';

/** Candidate products roots for a user-typed path, in the order they are tried. */
export function candidateProductsRoots(inputPath: string): string[] {
  const candidates = [path.join(inputPath, PRODUCTS_DIR)];
  if (path.basename(inputPath) === PRODUCTS_DIR) candidates.push(inputPath);
  candidates.push(path.join(inputPath, NESTED_PRODUCTS));
  return candidates;
}

/**
 * Finds the products root inside `inputPath`: `<input>/products`, `<input>` itself when it
 * is named `products`, then `<input>/_kano/backlog/products`. The first existing directory
 * wins and is canonicalised when possible.
 *
 * @throws BacklogError `workspace_not_found`
 */
export async function resolveProductsRoot(inputPath: string, fs: BacklogFileSystem = nodeFileSystem): Promise<string> {
  const trimmed = inputPath.trim();
  if (!trimmed) {
    throw new BacklogError('workspace_not_found', 'Missing workspace path');
  }

  for (const candidate of candidateProductsRoots(trimmed)) {
    if (!(await isDirectory(fs, candidate))) continue;
    try {
      return await fs.realpath(candidate);
    } catch {
      return candidate;
    }
  }
  throw new BacklogError('workspace_not_found', WORKSPACE_NOT_FOUND_MESSAGE);
}

/** Process-wide holder of the active products root. */
export class Workspace {
  private root: string;

  constructor(productsRoot: string) {
    this.root = productsRoot;
  }

  get productsRoot(): string {
    return this.root;
  }

  /** Topics and worksets live beside the products directory. */
  get workspaceRoot(): string {
    return path.dirname(this.root);
  }

  productRoot(product: string): string {
    return path.join(this.root, product);
  }

  replace(productsRoot: string): void {
    this.root = productsRoot;
  }

  info(): WorkspaceInfo {
    return { products_root: toPosix(this.productsRoot), workspace_root: toPosix(this.workspaceRoot) };
  }
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}
