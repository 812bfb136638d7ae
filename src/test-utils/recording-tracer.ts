/**
 * A Tracer that keeps every span in memory for assertions.
 */

import type {
  Tracer,
  TraceHandle,
  SpanHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
  AttributeValue,
  Attributes,
} from '../observability/types.js';

export interface RecordedEvent {
  name: string;
  attributes?: Attributes;
}

export interface RecordedSpan {
  name: string;
  kind: 'trace' | 'span' | 'generation';
  /** Name of the parent trace, for child spans */
  parent?: string;
  input?: unknown;
  model?: string;
  attributes: Record<string, AttributeValue>;
  events: RecordedEvent[];
  exceptions: unknown[];
  updates: UpdateData[];
  ended: boolean;
}

function recordSpan(record: RecordedSpan): SpanHandle {
  const handle: SpanHandle = {
    update(data: UpdateData): SpanHandle {
      record.updates.push(data);
      return handle;
    },
    setAttribute(key: string, value: AttributeValue): SpanHandle {
      record.attributes[key] = value;
      return handle;
    },
    addEvent(name: string, attributes?: Attributes): SpanHandle {
      record.events.push({ name, attributes });
      return handle;
    },
    recordException(error: unknown): SpanHandle {
      record.exceptions.push(error);
      return handle;
    },
    end(): void {
      record.ended = true;
    },
  };
  return handle;
}

export class RecordingTracer implements Tracer {
  readonly spans: RecordedSpan[] = [];
  readonly isRemote = false;
  flushes = 0;

  trace(options: TraceOptions): TraceHandle {
    const record = this.open('trace', options);
    Object.assign(record.attributes, options.attributes);
    const self = recordSpan(record);

    return {
      traceId: `trace-${this.spans.length}`,
      span: (child: SpanOptions) => this.child('span', options.name, child),
      generation: (child: GenerationOptions) => this.child('generation', options.name, child),
      update: self.update,
      setAttribute: self.setAttribute,
      addEvent: self.addEvent,
      recordException: self.recordException,
      end: self.end,
    };
  }

  async flush(): Promise<void> {
    this.flushes += 1;
  }

  async shutdown(): Promise<void> {}

  /** The first recorded span with this name */
  find(name: string): RecordedSpan {
    const span = this.spans.find((s) => s.name === name);
    if (!span) {
      throw new Error(`No span named ${name}; recorded: ${this.spans.map((s) => s.name).join(', ')}`);
    }
    return span;
  }

  /** Event names on a span, in order */
  eventNames(name: string): string[] {
    return this.find(name).events.map((e) => e.name);
  }

  private open(kind: RecordedSpan['kind'], options: SpanOptions, parent?: string): RecordedSpan {
    const record: RecordedSpan = {
      name: options.name,
      kind,
      parent,
      input: options.input,
      attributes: {},
      events: [],
      exceptions: [],
      updates: [],
      ended: false,
    };
    this.spans.push(record);
    return record;
  }

  private child(kind: 'span' | 'generation', parent: string, options: GenerationOptions): SpanHandle {
    const record = this.open(kind, options, parent);
    record.model = options.model;
    Object.assign(record.attributes, options.attributes);
    return recordSpan(record);
  }
}
