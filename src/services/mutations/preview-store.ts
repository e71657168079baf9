import { generateOpaqueToken } from '../../core/tokens.ts';
import { logger } from '../../utils/logger.ts';

export type PendingPreview<P> = {
  token: string;
  payload: P;
  summary: string;
  createdAt: number;
  expiresAt: number;
};

export type PreviewStoreOptions = {
  ttlMs: number;
  now?: () => number;
  sweepIntervalMs?: number;
};

/**
 * In-memory table of previews awaiting confirmation.
 *
 * `take` is a synchronous read-and-delete, so two concurrent confirms of one token
 * cannot both receive it.
 */
export class PreviewStore<P> {
  private readonly entries = new Map<string, PendingPreview<P>>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly sweepIntervalMs: number;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: PreviewStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? (() => Date.now());
    this.sweepIntervalMs = options.sweepIntervalMs ?? 60_000;
  }

  get size(): number {
    return this.entries.size;
  }

  put(payload: P, summary: string): PendingPreview<P> {
    this.sweep();
    const createdAt = this.now();
    const preview: PendingPreview<P> = {
      token: generateOpaqueToken(32),
      payload,
      summary,
      createdAt,
      expiresAt: createdAt + this.ttlMs,
    };
    this.entries.set(preview.token, preview);
    return preview;
  }

  take(token: string): PendingPreview<P> | null {
    const preview = this.entries.get(token);
    if (!preview) {
      return null;
    }
    this.entries.delete(token);
    if (preview.expiresAt <= this.now()) {
      return null;
    }
    return preview;
  }

  discard(token: string): boolean {
    return this.entries.delete(token);
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [token, preview] of this.entries) {
      if (preview.expiresAt <= now) {
        this.entries.delete(token);
        removed++;
      }
    }
    if (removed > 0) {
      void logger.debug('previews', { message: 'Expired previews purged', removed });
    }
    return removed;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.sweep(), this.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
