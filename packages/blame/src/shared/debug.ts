/**
 * Debug Channels
 *
 * Targeted logging for following how a blame path is found and how a region
 * error is phrased. Complementary to CompileTrace (timing and structure), the
 * channels show *which* edges were considered and *why* one was chosen.
 *
 * Enable via environment variable:
 * ```bash
 * REGIONCK_DEBUG=blame npm test          # Blame selection only
 * REGIONCK_DEBUG=graph,report npm test   # Multiple channels
 * REGIONCK_DEBUG=* npm test              # Everything
 * ```
 *
 * In code (always present, a no-op when disabled):
 * ```typescript
 * debug.blame("path", { from, target, length });
 * debug.report("shape", { category, frIsLocal, outlivedFrIsLocal });
 * ```
 */

export type DebugData = Record<string, unknown>;

export type DebugChannel = (point: string, data?: DebugData) => void;

export interface DebugConfig {
  /** Machine-readable JSON lines or compact human-readable output */
  format: "json" | "pretty";
  timestamps: boolean;
  /** Defaults to console.error so debug output never mixes with tool stdout */
  output: (message: string) => void;
}

const ENV_VAR = "REGIONCK_DEBUG";

const DEFAULT_CONFIG: DebugConfig = {
  format: "pretty",
  timestamps: false,
  output: (message) => console.error(message),
};

let config: DebugConfig = { ...DEFAULT_CONFIG };

function parseDebugEnv(): Set<string> {
  const env = process.env[ENV_VAR] ?? "";
  if (!env || env === "0" || env === "false") return new Set();
  if (env === "*" || env === "1" || env === "true") return new Set(["*"]);
  return new Set(env.split(",").map((s) => s.trim().toLowerCase()).filter(Boolean));
}

let enabledChannels = parseDebugEnv();

const extraChannels = new Map<string, DebugChannel>();

function isEnabled(channel: string): boolean {
  return enabledChannels.has("*") || enabledChannels.has(channel.toLowerCase());
}

function formatMessage(channel: string, point: string, data: DebugData | undefined): string {
  if (config.format === "json") {
    return JSON.stringify({
      channel,
      point,
      ...(data && { data }),
      ...(config.timestamps && { timestamp: Date.now() }),
    });
  }

  const prefix = config.timestamps ? `[${new Date().toISOString()}] ` : "";
  const label = `[${channel}.${point}]`;
  if (!data || Object.keys(data).length === 0) return `${prefix}${label}`;
  return `${prefix}${label} ${formatData(data)}`;
}

function formatData(data: DebugData): string {
  const parts = Object.entries(data).map(([key, value]) => `${key}=${formatValue(value, 0)}`);
  const inline = `{ ${parts.join(", ")} }`;
  if (inline.length <= 100) return inline;
  return `{\n  ${parts.join(",\n  ")}\n}`;
}

function formatValue(value: unknown, depth: number): string {
  if (value === null) return "null";
  if (value === undefined) return "undefined";
  if (typeof value === "string") {
    return value.length > 60 ? `"${value.slice(0, 57)}..."` : `"${value}"`;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (Array.isArray(value)) {
    if (value.length === 0) return "[]";
    // Blame paths are short; print them whole until they stop fitting on a line.
    const items = value.map((v) => formatValue(v, depth + 1));
    const inline = `[${items.join(", ")}]`;
    return inline.length <= 80 ? inline : `[${value.length} items]`;
  }
  if (typeof value === "object") {
    if (depth >= 2) return "{...}";
    const entries = Object.entries(value).map(([k, v]) => `${k}: ${formatValue(v, depth + 1)}`);
    return `{ ${entries.join(", ")} }`;
  }
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}

function createChannel(name: string): DebugChannel {
  if (!isEnabled(name)) {
    return () => {};
  }
  return (point, data) => {
    config.output(formatMessage(name, point, data));
  };
}

const CHANNEL_NAMES = ["graph", "blame", "report", "suggest", "lsp"] as const;

export type DebugChannelName = (typeof CHANNEL_NAMES)[number];

export type Debug = Record<DebugChannelName, DebugChannel>;

function createChannels(): Debug {
  return {
    /** Graph construction and SCC computation */
    graph: createChannel("graph"),
    /** Path search and blame selection */
    blame: createChannel("blame"),
    /** Shape dispatch and diagnostic assembly */
    report: createChannel("report"),
    /** Static impl-Trait suggestion */
    suggest: createChannel("suggest"),
    /** LSP mapping */
    lsp: createChannel("lsp"),
  };
}

export const debug: Debug = createChannels();

/** Get or create an ad-hoc channel (refreshed together with the built-in ones). */
export function getDebugChannel(name: string): DebugChannel {
  const key = name.trim().toLowerCase();
  if (!key) return () => {};
  const existing = extraChannels.get(key);
  if (existing) return existing;
  const channel = createChannel(key);
  extraChannels.set(key, channel);
  return channel;
}

/** Re-read REGIONCK_DEBUG and rebuild every channel. */
export function refreshDebugChannels(): void {
  enabledChannels = parseDebugEnv();
  Object.assign(debug, createChannels());
  for (const name of extraChannels.keys()) {
    extraChannels.set(name, createChannel(name));
  }
}

export function configureDebug(options: Partial<DebugConfig>): void {
  config = { ...config, ...options };
}

export function isDebugEnabled(channel?: string): boolean {
  if (channel) return isEnabled(channel);
  return enabledChannels.size > 0;
}

export { CHANNEL_NAMES as DEBUG_CHANNEL_NAMES };
