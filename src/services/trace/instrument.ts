/**
 * Span instrumentation
 *
 * Wraps sync and async functions in an OpenTelemetry span that stays
 * active for the whole call, including the settlement of a returned
 * promise.
 *
 * @example
 * const loadUser = instrument(async (id: string) => repo.find(id), { namespace: 'users' });
 * const tagged = instrumentWithSpan((span, id: string) => {
 *   span.setAttribute('user.id', id);
 * });
 */

import { fileURLToPath } from 'url';
import { SpanStatusCode, trace, type Attributes, type Span, type Tracer } from '@opentelemetry/api';
import {
  SEMATTRS_CODE_FILEPATH,
  SEMATTRS_CODE_FUNCTION,
  SEMATTRS_CODE_LINENO,
  SEMATTRS_CODE_NAMESPACE
} from '@opentelemetry/semantic-conventions';

export const DEFAULT_TRACER_NAME = 'toolbox';

export interface InstrumentOptions {
  /** Span name; defaults to the function name, prefixed by the namespace */
  spanName?: string;
  /** Logical owner of the function, e.g. a class or module name */
  namespace?: string;
  /** Add an `exception` event when the call fails (status is set regardless) */
  recordException?: boolean;
  tracer?: Tracer;
}

interface CallSite {
  filepath?: string;
  lineno?: number;
}

const FRAME_PATTERN = /\(?((?:file:\/\/)?[^\s()]+?):(\d+):\d+\)?$/;

/**
 * File and line of the code that called into this module, `depth`
 * frames above the caller of callSite()
 */
function callSite(depth: number): CallSite {
  const frames = (new Error().stack ?? '').split('\n').slice(1);
  const frame = frames[depth + 1];
  const match = frame ? FRAME_PATTERN.exec(frame.trim()) : null;
  if (!match) {
    return {};
  }
  const file = match[1].startsWith('file://') ? fileURLToPath(match[1]) : match[1];
  return { filepath: file, lineno: Number(match[2]) };
}

function codeAttributes(namespace: string | undefined, functionName: string, site: CallSite): Attributes {
  const attributes: Attributes = { [SEMATTRS_CODE_FUNCTION]: functionName };
  if (namespace) {
    attributes[SEMATTRS_CODE_NAMESPACE] = namespace;
  }
  if (site.filepath) {
    attributes[SEMATTRS_CODE_FILEPATH] = site.filepath;
  }
  if (site.lineno !== undefined) {
    attributes[SEMATTRS_CODE_LINENO] = site.lineno;
  }
  return attributes;
}

interface SpanPlan {
  tracer: Tracer;
  name: string;
  attributes: Attributes;
  recordException: boolean;
}

function plan(functionName: string, options: InstrumentOptions, site: CallSite): SpanPlan {
  const name = functionName || 'anonymous';
  return {
    tracer: options.tracer ?? trace.getTracer(options.namespace ?? DEFAULT_TRACER_NAME),
    name: options.spanName ?? (options.namespace ? `${options.namespace}.${name}` : name),
    attributes: codeAttributes(options.namespace, name, site),
    recordException: options.recordException ?? true
  };
}

function markFailed(span: Span, error: unknown, recordException: boolean): void {
  const message = error instanceof Error ? error.message : String(error);
  if (recordException) {
    span.recordException(error instanceof Error ? error : message);
  }
  span.setStatus({ code: SpanStatusCode.ERROR, message });
}

function runInSpan<R>(spanPlan: SpanPlan, body: (span: Span) => R): R {
  const { tracer, name, attributes, recordException } = spanPlan;
  return tracer.startActiveSpan(name, { attributes }, (span) => {
    let result: R;
    try {
      result = body(span);
    } catch (error) {
      markFailed(span, error, recordException);
      span.end();
      throw error;
    }
    if (result instanceof Promise) {
      // The caller keeps the original promise; this branch only ends the span
      void result.then(
        () => span.end(),
        (error: unknown) => {
          markFailed(span, error, recordException);
          span.end();
        }
      );
      return result;
    }
    span.end();
    return result;
  });
}

/**
 * Wrap `fn` so every call runs inside its own active span
 */
export function instrument<T, A extends unknown[], R>(
  fn: (this: T, ...args: A) => R,
  options: InstrumentOptions = {}
): (this: T, ...args: A) => R {
  const spanPlan = plan(fn.name, options, callSite(1));
  return function (this: T, ...args: A): R {
    return runInSpan(spanPlan, () => fn.apply(this, args));
  };
}

/**
 * Like instrument(), but hands the span to `fn` as its first argument
 * so it can add attributes and events
 */
export function instrumentWithSpan<T, A extends unknown[], R>(
  fn: (this: T, span: Span, ...args: A) => R,
  options: InstrumentOptions = {}
): (this: T, ...args: A) => R {
  const spanPlan = plan(fn.name, options, callSite(1));
  return function (this: T, ...args: A): R {
    return runInSpan(spanPlan, (span) => fn.call(this, span, ...args));
  };
}
