import { inspect } from 'node:util';

export type ServerLogLevel = 'debug' | 'info' | 'warn' | 'error';

export type ServerLogEntry = {
  id: number;
  time: string;
  level: ServerLogLevel;
  message: string;
  context: string | null;
};

const LEVEL_RANK: Record<ServerLogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Nest boot chatter; dropped unless it is a warning or an error.
const FRAMEWORK_CONTEXTS = new Set([
  'NestFactory',
  'InstanceLoader',
  'RoutesResolver',
  'RouterExplorer',
  'NestApplication',
]);

const MAX_MESSAGE_CHARS = 8_000;

function stringify(input: unknown): string {
  if (input instanceof Error) return input.stack ?? input.message;
  if (typeof input === 'string') return input;
  if (input === null || input === undefined) return '';
  if (typeof input !== 'object') return String(input);
  try {
    return JSON.stringify(input) ?? inspect(input, { depth: 4 });
  } catch {
    return inspect(input, { depth: 4 });
  }
}

export function isServerLogLevel(value: unknown): value is ServerLogLevel {
  return (
    typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value)
  );
}

/** Fixed-size ring of the most recent log lines, oldest overwritten first. */
export class ServerLogBuffer {
  private readonly slots: Array<ServerLogEntry | undefined>;
  private head = 0;
  private size = 0;
  private lastId = 0;

  constructor(
    readonly capacity: number,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.slots = new Array<ServerLogEntry | undefined>(Math.max(1, capacity));
  }

  add(params: {
    level: ServerLogLevel;
    message: unknown;
    stack?: unknown;
    context?: unknown;
  }): ServerLogEntry | null {
    const context =
      typeof params.context === 'string' && params.context.trim()
        ? params.context.trim()
        : null;
    if (params.level !== 'error' && params.level !== 'warn' && context) {
      if (FRAMEWORK_CONTEXTS.has(context)) return null;
    }

    const msg = stringify(params.message).trim();
    const stack = stringify(params.stack).trim();
    const text = [msg, stack].filter(Boolean).join('\n');
    if (!text) return null;

    const entry: ServerLogEntry = {
      id: ++this.lastId,
      time: this.now().toISOString(),
      level: params.level,
      message:
        text.length > MAX_MESSAGE_CHARS ? `${text.slice(0, MAX_MESSAGE_CHARS)}…` : text,
      context,
    };
    this.push(entry);
    return entry;
  }

  list(params: { afterId?: number; limit?: number; minLevel?: ServerLogLevel } = {}): {
    logs: ServerLogEntry[];
    latestId: number;
  } {
    const limit = Math.max(1, Math.min(this.slots.length, params.limit ?? 200));
    const minRank = LEVEL_RANK[params.minLevel ?? 'debug'];
    const afterId = params.afterId;

    const logs = this.ordered().filter(
      (e) =>
        LEVEL_RANK[e.level] >= minRank && (afterId === undefined || e.id > afterId),
    );
    return { logs: logs.slice(-limit), latestId: this.lastId };
  }

  pruneOlderThan(cutoff: Date): { removed: number; kept: number } {
    const cutoffMs = cutoff.getTime();
    const all = this.ordered();
    const kept = all.filter((e) => Date.parse(e.time) >= cutoffMs);
    this.slots.fill(undefined);
    this.head = 0;
    this.size = 0;
    for (const e of kept) this.push(e);
    return { removed: all.length - kept.length, kept: kept.length };
  }

  clear(): void {
    this.slots.fill(undefined);
    this.head = 0;
    this.size = 0;
  }

  private push(entry: ServerLogEntry): void {
    this.slots[this.head] = entry;
    this.head = (this.head + 1) % this.slots.length;
    this.size = Math.min(this.slots.length, this.size + 1);
  }

  private ordered(): ServerLogEntry[] {
    const start = this.size === this.slots.length ? this.head : 0;
    const out: ServerLogEntry[] = [];
    for (let i = 0; i < this.size; i += 1) {
      const e = this.slots[(start + i) % this.slots.length];
      if (e) out.push(e);
    }
    return out;
  }
}

export const serverLogs = new ServerLogBuffer(2_000);
