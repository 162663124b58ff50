import type {
  GetItemResult,
  KanbanResult,
  ListItemsResult,
  RefreshResult,
  SwitchWorkspaceResult,
  TreeResult,
  WorkspaceInfo,
} from '../contracts/backlogService';

const DEFAULT_BASE_URL = 'http://127.0.0.1:8787';

type FetchImpl = typeof fetch;

export interface BacklogClientOptions {
  baseUrl?: string;
  /** Allows dependency injection for testing. */
  fetch?: FetchImpl;
}

export interface ReadOptions {
  /** Forces the server to rebuild the product cache before answering. */
  refresh?: boolean;
}

interface ResponseEnvelope {
  ok?: boolean;
  data?: unknown;
}

export class BacklogApiError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(status: number, code: string, message: string) {
    super(message);
    this.name = 'BacklogApiError';
    this.status = status;
    this.code = code;
  }
}

export interface BacklogClient {
  listProducts(): Promise<string[]>;
  listItems(product: string, options?: ReadOptions & { q?: string }): Promise<ListItemsResult>;
  getItem(product: string, id: string, options?: ReadOptions): Promise<GetItemResult>;
  tree(product: string, options?: ReadOptions): Promise<TreeResult>;
  kanban(product: string, options?: ReadOptions): Promise<KanbanResult>;
  refresh(product?: string): Promise<RefreshResult>;
  workspaceInfo(): Promise<WorkspaceInfo>;
  switchWorkspace(path: string): Promise<SwitchWorkspaceResult>;
}

/**
 * Typed client for the backlog webview HTTP API.
 * Unwraps the `{ ok, data }` envelope and raises `BacklogApiError` on failures.
 */
export function createBacklogClient(options: BacklogClientOptions = {}): BacklogClient {
  const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
  const fetchImpl: FetchImpl | undefined = options.fetch ?? globalThis.fetch;
  if (!fetchImpl) {
    throw new Error('createBacklogClient: fetch implementation required (pass options.fetch).');
  }
  const boundFetch: FetchImpl = (input, init) => fetchImpl(input, init);

  // data is not re-validated here; it is whatever the server built from the shared contracts
  async function get<T>(pathname: string, params: Record<string, string | undefined> = {}): Promise<T> {
    const url = new URL(`${baseUrl}${pathname}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') url.searchParams.set(key, value);
    }

    const res = await boundFetch(url.toString(), { method: 'GET', headers: { Accept: 'application/json' } });
    const body = await readEnvelope(res);
    if (!res.ok || !body.ok) {
      const { code, message } = describeFailure(body.data, res);
      throw new BacklogApiError(res.status, code, message);
    }
    return body.data as T;
  }

  const flag = (opts?: ReadOptions) => (opts?.refresh ? '1' : undefined);

  return {
    listProducts: () => get<string[]>('/api/products'),
    listItems: (product, opts) => get<ListItemsResult>('/api/items', { product, q: opts?.q, refresh: flag(opts) }),
    getItem: (product, id, opts) =>
      get<GetItemResult>(`/api/items/${encodeURIComponent(id)}`, { product, refresh: flag(opts) }),
    tree: (product, opts) => get<TreeResult>('/api/tree', { product, refresh: flag(opts) }),
    kanban: (product, opts) => get<KanbanResult>('/api/kanban', { product, refresh: flag(opts) }),
    refresh: (product) => get<RefreshResult>('/api/refresh', { product }),
    workspaceInfo: () => get<WorkspaceInfo>('/api/workspace/info'),
    switchWorkspace: (path) => get<SwitchWorkspaceResult>('/api/workspace/switch', { path }),
  };
}

async function readEnvelope(res: Response): Promise<ResponseEnvelope> {
  let parsed: unknown;
  try {
    parsed = await res.json();
  } catch {
    throw new BacklogApiError(res.status, 'invalid_response', `Non-JSON response (${res.status} ${res.statusText})`);
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new BacklogApiError(res.status, 'invalid_response', 'Response is not an envelope');
  }
  return {
    ok: 'ok' in parsed && parsed.ok === true,
    data: 'data' in parsed ? parsed.data : undefined,
  };
}

function describeFailure(data: unknown, res: Response): { code: string; message: string } {
  if (typeof data === 'object' && data !== null) {
    const error = 'error' in data && typeof data.error === 'string' ? data.error : undefined;
    const code = 'code' in data && typeof data.code === 'string' ? data.code : undefined;
    if (error) return { code: code ?? error, message: error };
  }
  return { code: 'http_error', message: `${res.status} ${res.statusText}` };
}
