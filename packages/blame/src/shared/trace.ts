/* =======================================================================================
 * COMPILE TRACE - instrumentation for region error reporting
 * ---------------------------------------------------------------------------------------
 * - TraceSpan: unit of work with timing, hierarchy, attributes and events
 * - CompileTrace: API used by the reporter (span, event, setAttribute)
 * - TraceExporter: pluggable backend (collecting, console)
 * - NOOP_TRACE: default when no trace is configured
 * ======================================================================================= */

export type AttributeValue =
  | string
  | number
  | boolean
  | null
  | readonly AttributeValue[];

export type ReadonlyAttributeMap = ReadonlyMap<string, AttributeValue>;

export interface SpanEvent {
  readonly name: string;
  /** Nanoseconds, from process.hrtime.bigint */
  readonly timestamp: bigint;
  readonly attributes: ReadonlyAttributeMap;
}

export interface TraceSpan {
  readonly name: string;
  readonly spanId: string;
  readonly traceId: string;
  readonly parent: TraceSpan | null;
  readonly children: readonly TraceSpan[];

  readonly startTime: bigint;
  readonly endTime: bigint | null;
  readonly duration: bigint | null;

  readonly attributes: ReadonlyAttributeMap;
  readonly events: readonly SpanEvent[];

  end(): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;
  addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
}

export interface TraceExporter {
  onSpanStart(span: TraceSpan): void;
  onSpanEnd(span: TraceSpan): void;
  onEvent(span: TraceSpan, event: SpanEvent): void;
  flush(): Promise<void>;
  shutdown(): Promise<void>;
}

/**
 * Main instrumentation API.
 *
 * @example
 * const selected = trace.span("blame.select", () => bestBlameConstraint(ctx, fr, isTarget));
 * trace.event("report.shape", { shape: "escaping-data" });
 */
export interface CompileTrace {
  /** Run `fn` inside a named span; the span ends when `fn` returns or throws. */
  span<T>(name: string, fn: () => T): T;

  event(name: string, attributes?: Record<string, AttributeValue>): void;
  setAttribute(key: string, value: AttributeValue): void;
  setAttributes(attrs: Record<string, AttributeValue>): void;

  /** Caller is responsible for calling end() on the returned span. */
  startSpan(name: string): TraceSpan;
  currentSpan(): TraceSpan | undefined;
  rootSpan(): TraceSpan;

  flush(): Promise<void>;
}

/** Attribute keys shared by every region-error trace. */
export const BlameAttributes = {
  FR: "region.fr",
  OUTLIVED_FR: "region.outlived_fr",
  FROM: "blame.from",
  TARGET: "blame.target",
  PATH_LENGTH: "blame.path_length",
  CATEGORY: "blame.category",
  FALLBACK: "blame.fallback",
  SHAPE: "report.shape",
  SPECIALIZED: "report.specialized",
  DIAG_CODE: "diag.code",
} as const;

export type BlameAttributeKey = (typeof BlameAttributes)[keyof typeof BlameAttributes];

export const NOOP_SPAN: TraceSpan = {
  name: "",
  spanId: "",
  traceId: "",
  parent: null,
  children: [],
  startTime: 0n,
  endTime: null,
  duration: null,
  attributes: new Map(),
  events: [],
  end: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  addEvent: () => {},
};

/**
 * No-op trace that executes functions without instrumentation.
 *
 * @example
 * const trace = options.trace ?? NOOP_TRACE;
 */
export const NOOP_TRACE: CompileTrace = {
  span: <T>(_name: string, fn: () => T): T => fn(),
  event: () => {},
  setAttribute: () => {},
  setAttributes: () => {},
  startSpan: () => NOOP_SPAN,
  currentSpan: () => undefined,
  rootSpan: () => NOOP_SPAN,
  flush: () => Promise.resolve(),
};

export function nowNanos(): bigint {
  return process.hrtime.bigint();
}

export function formatDuration(nanos: bigint): string {
  const ns = Number(nanos);
  if (ns < 1_000) return `${ns}ns`;
  if (ns < 1_000_000) return `${(ns / 1_000).toFixed(2)}µs`;
  if (ns < 1_000_000_000) return `${(ns / 1_000_000).toFixed(2)}ms`;
  return `${(ns / 1_000_000_000).toFixed(2)}s`;
}

let spanIdCounter = 0;

function generateSpanId(): string {
  return `span_${++spanIdCounter}`;
}

function generateTraceId(): string {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).slice(2, 8);
  return `trace_${timestamp}_${random}`;
}

class SpanImpl implements TraceSpan {
  readonly spanId = generateSpanId();
  readonly startTime = nowNanos();

  private _endTime: bigint | null = null;
  private readonly _children: TraceSpan[] = [];
  private readonly _attributes = new Map<string, AttributeValue>();
  private readonly _events: SpanEvent[] = [];
  private readonly _onEnd: (() => void) | null;

  constructor(
    readonly name: string,
    readonly traceId: string,
    readonly parent: SpanImpl | null,
    private readonly exporter: TraceExporter | null,
    onEnd: (() => void) | null = null,
  ) {
    this._onEnd = onEnd;
    parent?._children.push(this);
    this.exporter?.onSpanStart(this);
  }

  get endTime(): bigint | null {
    return this._endTime;
  }

  get duration(): bigint | null {
    return this._endTime !== null ? this._endTime - this.startTime : null;
  }

  get children(): readonly TraceSpan[] {
    return this._children;
  }

  get attributes(): ReadonlyAttributeMap {
    return this._attributes;
  }

  get events(): readonly SpanEvent[] {
    return this._events;
  }

  end(): void {
    if (this._endTime !== null) return;
    this._endTime = nowNanos();
    this.exporter?.onSpanEnd(this);
    this._onEnd?.();
  }

  setAttribute(key: string, value: AttributeValue): void {
    this._attributes.set(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    for (const [key, value] of Object.entries(attrs)) {
      this._attributes.set(key, value);
    }
  }

  addEvent(name: string, attributes?: Record<string, AttributeValue>): void {
    const event: SpanEvent = {
      name,
      timestamp: nowNanos(),
      attributes: new Map(Object.entries(attributes ?? {})),
    };
    this._events.push(event);
    this.exporter?.onEvent(this, event);
  }
}

export interface CreateTraceOptions {
  /** Name for the root span */
  name?: string;
  exporter?: TraceExporter;
  traceId?: string;
}

class CompileTraceImpl implements CompileTrace {
  private readonly _traceId: string;
  private readonly _exporter: TraceExporter | null;
  private readonly _rootSpan: SpanImpl;
  private _currentSpan: SpanImpl;

  constructor(options: CreateTraceOptions = {}) {
    this._traceId = options.traceId ?? generateTraceId();
    this._exporter = options.exporter ?? null;
    this._rootSpan = new SpanImpl(options.name ?? "trace", this._traceId, null, this._exporter);
    this._currentSpan = this._rootSpan;
  }

  span<T>(name: string, fn: () => T): T {
    const span = this.startSpan(name);
    try {
      return fn();
    } catch (error) {
      span.setAttribute("error", true);
      span.setAttribute("error.message", error instanceof Error ? error.message : String(error));
      throw error;
    } finally {
      span.end();
    }
  }

  event(name: string, attributes?: Record<string, AttributeValue>): void {
    this._currentSpan.addEvent(name, attributes);
  }

  setAttribute(key: string, value: AttributeValue): void {
    this._currentSpan.setAttribute(key, value);
  }

  setAttributes(attrs: Record<string, AttributeValue>): void {
    this._currentSpan.setAttributes(attrs);
  }

  startSpan(name: string): TraceSpan {
    const previous = this._currentSpan;
    const span: SpanImpl = new SpanImpl(name, this._traceId, previous, this._exporter, () => {
      if (this._currentSpan === span) this._currentSpan = previous;
    });
    this._currentSpan = span;
    return span;
  }

  currentSpan(): TraceSpan | undefined {
    return this._currentSpan;
  }

  rootSpan(): TraceSpan {
    return this._rootSpan;
  }

  async flush(): Promise<void> {
    await this._exporter?.flush();
  }
}

/**
 * Create a trace for instrumenting region error reporting.
 *
 * @example
 * const exporter = createCollectingExporter();
 * const reporter = new RegionErrorReporter(ctx, { trace: createTrace({ name: "borrowck", exporter }) });
 */
export function createTrace(options?: CreateTraceOptions): CompileTrace {
  return new CompileTraceImpl(options);
}
