import { z } from 'zod';
import type { MetricSource, RelationshipReading, RelationshipRole } from '../monitor/types.js';

/**
 * Qumulo Core REST API client -- the metric source for alert runs.
 *
 * Logs in with a username and password to obtain a bearer token, then reads
 * file-system capacity, directory quota usage and replication relationship
 * status. All calls are read-only. Clusters usually serve a self-signed
 * certificate; set NODE_TLS_REJECT_UNAUTHORIZED=0 in the environment when
 * that is the case.
 */

export interface QumuloClientOptions {
  host: string;
  port?: number;
  username: string;
  password: string;
  timeoutMs?: number;
  quotaPageSize?: number;
}

// -------------------------------------------------------------------- Schemas

/** Sizes arrive as decimal strings */
const byteCount = z.coerce.number().nonnegative();

const loginSchema = z.object({ bearer_token: z.string().min(1) });

const fsStatsSchema = z.object({
  total_size_bytes: byteCount,
  free_size_bytes: byteCount,
});

const quotaPageSchema = z.object({
  quotas: z.array(
    z.object({
      path: z.string(),
      limit: byteCount,
      capacity_usage: byteCount,
    }),
  ),
  paging: z.object({ next: z.string().nullish() }).optional(),
});

const relationshipStatusSchema = z.object({
  id: z.string(),
  source_cluster_name: z.string().nullish(),
  source_root_path: z.string().nullish(),
  target_cluster_name: z.string().nullish(),
  target_root_path: z.string().nullish(),
  recovery_point: z.string().nullish(),
  error_from_last_job: z.string().nullish(),
});

const relationshipListSchema = z.array(relationshipStatusSchema);

type RelationshipStatus = z.infer<typeof relationshipStatusSchema>;

function toReading(status: RelationshipStatus, role: RelationshipRole): RelationshipReading {
  return {
    id: status.id,
    role,
    sourceClusterName: status.source_cluster_name ?? '',
    sourceRootPath: status.source_root_path ?? '',
    targetClusterName: status.target_cluster_name ?? '',
    targetRootPath: status.target_root_path ?? '',
    recoveryPoint: status.recovery_point || null,
    error: status.error_from_last_job || null,
  };
}

// --------------------------------------------------------------------- Client

export class QumuloClient implements MetricSource {
  private readonly baseUrl: string;
  private readonly host: string;
  private readonly username: string;
  private readonly password: string;
  private readonly timeoutMs: number;
  private readonly quotaPageSize: number;
  private token: string | null = null;

  constructor(opts: QumuloClientOptions) {
    const port = opts.port ?? 8000;
    this.host = opts.host;
    this.baseUrl = `https://${opts.host}:${port}`;
    this.username = opts.username;
    this.password = opts.password;
    this.timeoutMs = opts.timeoutMs ?? 15_000;
    this.quotaPageSize = opts.quotaPageSize ?? 1000;
  }

  get clusterHost(): string {
    return this.host;
  }

  // ------------------------------------------------------------------ Generic
  /**
   * Send a request and validate the JSON response against `schema`.
   * Errors carry the method, host and path.
   */
  private async request<S extends z.ZodTypeAny>(
    method: 'GET' | 'POST',
    path: string,
    schema: S,
    body?: Record<string, unknown>,
  ): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.token) headers.Authorization = `Bearer ${this.token}`;

    try {
      const res = await fetch(url, {
        method,
        headers,
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      if (!res.ok) {
        const text = await res.text().catch(() => '(no body)');
        throw new Error(`Qumulo ${method} ${this.host}${path} failed: ${res.status} ${res.statusText} -- ${text}`);
      }

      const parsed = schema.safeParse(await res.json());
      if (!parsed.success) {
        throw new Error(
          `Qumulo ${method} ${this.host}${path} returned an unexpected response: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        );
      }
      return parsed.data;
    } catch (err: unknown) {
      if (err instanceof Error && err.name === 'AbortError') {
        throw new Error(`Qumulo ${method} ${this.host}${path} timed out after ${this.timeoutMs}ms`);
      }
      if (err instanceof Error && err.message.startsWith('Qumulo')) {
        throw err; // already ours
      }
      throw new Error(
        `Qumulo ${method} ${this.host}${path} network error: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  // ------------------------------------------------------------------ Session
  /** Exchange the username and password for a bearer token. */
  async login(): Promise<void> {
    const result = await this.request('POST', '/v1/session/login', loginSchema, {
      username: this.username,
      password: this.password,
    });
    this.token = result.bearer_token;
  }

  // ------------------------------------------------------------------ Metrics
  async getCapacityUsage(): Promise<{ usedBytes: number; totalBytes: number }> {
    const stats = await this.request('GET', '/v1/file-system', fsStatsSchema);
    return {
      totalBytes: stats.total_size_bytes,
      usedBytes: stats.total_size_bytes - stats.free_size_bytes,
    };
  }

  /** All directory quotas with their current usage, following pagination. */
  async listQuotaUsage(): Promise<Array<{ path: string; usedBytes: number; limitBytes: number }>> {
    const quotas: Array<{ path: string; usedBytes: number; limitBytes: number }> = [];
    const visited = new Set<string>();
    let next: string | null = `/v1/files/quotas/status/?limit=${this.quotaPageSize}`;

    while (next && !visited.has(next)) {
      visited.add(next);
      const page: z.infer<typeof quotaPageSchema> = await this.request('GET', next, quotaPageSchema);
      for (const quota of page.quotas) {
        quotas.push({ path: quota.path, usedBytes: quota.capacity_usage, limitBytes: quota.limit });
      }
      next = page.quotas.length > 0 ? page.paging?.next || null : null;
    }

    return quotas;
  }

  /** Source and target relationships of this cluster, with their last-job errors. */
  async listReplicationRelationships(): Promise<RelationshipReading[]> {
    const [sources, targets] = await Promise.all([
      this.request('GET', '/v2/replication/source-relationships/status/', relationshipListSchema),
      this.request('GET', '/v2/replication/target-relationships/status/', relationshipListSchema),
    ]);
    return [
      ...sources.map((s) => toReading(s, 'source')),
      ...targets.map((t) => toReading(t, 'target')),
    ];
  }
}
