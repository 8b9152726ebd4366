/* =======================================================================================
 * TRACE EXPORTERS
 * ---------------------------------------------------------------------------------------
 * - CollectingExporter: keeps finished spans and events in memory (tests, tooling)
 * - ConsoleExporter: indented human-readable lines for local debugging
 * ======================================================================================= */

import type { AttributeValue, SpanEvent, TraceExporter, TraceSpan } from "./trace.js";
import { formatDuration } from "./trace.js";

export const NOOP_EXPORTER: TraceExporter = {
  onSpanStart: () => {},
  onSpanEnd: () => {},
  onEvent: () => {},
  flush: () => Promise.resolve(),
  shutdown: () => Promise.resolve(),
};

export interface CollectedEvent {
  readonly spanName: string;
  readonly event: SpanEvent;
}

export interface CollectingExporter extends TraceExporter {
  /** Spans in the order they ended */
  readonly spans: readonly TraceSpan[];
  readonly events: readonly CollectedEvent[];
  eventsNamed(name: string): SpanEvent[];
  clear(): void;
}

export function createCollectingExporter(): CollectingExporter {
  const spans: TraceSpan[] = [];
  const events: CollectedEvent[] = [];
  return {
    spans,
    events,
    onSpanStart: () => {},
    onSpanEnd(span) {
      spans.push(span);
    },
    onEvent(span, event) {
      events.push({ spanName: span.name, event });
    },
    eventsNamed(name) {
      return events.filter((e) => e.event.name === name).map((e) => e.event);
    },
    clear() {
      spans.length = 0;
      events.length = 0;
    },
    flush: () => Promise.resolve(),
    shutdown: () => Promise.resolve(),
  };
}

export interface ConsoleExporterOptions {
  /** Spans shorter than this (nanoseconds) are not printed. Default: 0n */
  minDuration?: bigint;
  logEvents?: boolean;
  logAttributes?: boolean;
  /** Default: console.error */
  log?: (message: string) => void;
  /** Default: "[trace]" */
  prefix?: string;
}

export class ConsoleExporter implements TraceExporter {
  private readonly options: Required<ConsoleExporterOptions>;
  private depth = 0;

  constructor(options: ConsoleExporterOptions = {}) {
    this.options = {
      minDuration: options.minDuration ?? 0n,
      logEvents: options.logEvents ?? true,
      logAttributes: options.logAttributes ?? true,
      log: options.log ?? ((message) => console.error(message)),
      prefix: options.prefix ?? "[trace]",
    };
  }

  onSpanStart(span: TraceSpan): void {
    this.options.log(`${this.options.prefix} ${this.indent()}${span.name} started`);
    this.depth++;
  }

  onSpanEnd(span: TraceSpan): void {
    this.depth = Math.max(0, this.depth - 1);
    if (span.duration !== null && span.duration < this.options.minDuration) return;
    const duration = span.duration !== null ? formatDuration(span.duration) : "?";
    const attrs = this.options.logAttributes ? formatAttributes(span.attributes) : "";
    this.options.log(`${this.options.prefix} ${this.indent()}${span.name} (${duration})${attrs}`);
  }

  onEvent(_span: TraceSpan, event: SpanEvent): void {
    if (!this.options.logEvents) return;
    const attrs = this.options.logAttributes ? formatAttributes(event.attributes) : "";
    this.options.log(`${this.options.prefix} ${this.indent()}• ${event.name}${attrs}`);
  }

  flush(): Promise<void> {
    return Promise.resolve();
  }

  shutdown(): Promise<void> {
    return Promise.resolve();
  }

  private indent(): string {
    return "  ".repeat(this.depth);
  }
}

export function createConsoleExporter(options?: ConsoleExporterOptions): ConsoleExporter {
  return new ConsoleExporter(options);
}

function formatAttributes(attributes: ReadonlyMap<string, AttributeValue>): string {
  if (attributes.size === 0) return "";
  const parts: string[] = [];
  for (const [key, value] of attributes) {
    parts.push(`${key}=${JSON.stringify(value)}`);
  }
  return ` {${parts.join(", ")}}`;
}
