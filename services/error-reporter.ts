/**
 * Opt-in error reporting through Sentry (or a Sentry-compatible server such as GlitchTip).
 *
 * PRIVACY:
 * - off unless `enabled` and `consent` are both true and a DSN is configured
 * - sendDefaultPii: false, no breadcrumbs
 * - beforeSend rebuilds the event from an allowlist; messages and paths are scrubbed
 *   (commit messages can carry names, e-mail addresses and URLs)
 * - same error fingerprint is reported at most once per 60s
 */

import type * as SentryType from "@sentry/node";
import type { ErrorReportingConfig } from "../config.js";
import { createLogger, type Logger } from "../utils/logger.js";

let Sentry: typeof SentryType | null = null;
let initialized = false;
let logger: Logger = createLogger();
const errorDedup = new Map<string, number>(); // fingerprint -> timestamp

const DEDUP_WINDOW_MS = 60_000;

export async function initErrorReporter(
  config: ErrorReportingConfig,
  toolVersion: string,
  loggerInstance?: Logger,
): Promise<void> {
  if (loggerInstance) {
    logger = loggerInstance;
  }

  if (!config.enabled || !config.consent) {
    return;
  }
  if (!config.dsn) {
    logger.warn("error reporting enabled but no dsn configured; reporting disabled");
    return;
  }

  try {
    Sentry = await import("@sentry/node");
  } catch (err) {
    logger.warn(`failed to load @sentry/node, reporting disabled: ${err instanceof Error ? err.message : String(err)}`);
    return;
  }

  Sentry.init({
    dsn: config.dsn,
    release: `commit-bump@${toolVersion}`,
    environment: config.environment,
    sampleRate: config.sampleRate,
    maxBreadcrumbs: 0,
    sendDefaultPii: false,
    integrations: (defaults) =>
      defaults.filter((i) => ["LinkedErrors", "InboundFilters", "FunctionToString"].includes(i.name)),
    beforeSend(event) {
      return sanitizeEvent(event);
    },
  });

  initialized = true;
}

/** Event shape `beforeSend` receives and must return. */
type SentryErrorEvent = Parameters<NonNullable<SentryType.NodeOptions["beforeSend"]>>[0];

/**
 * Rebuild the event from an allowlist: identifiers, scrubbed message, exception type and value,
 * relative frame paths, and the subsystem/operation tags. Everything else (contexts, modules,
 * fingerprint, transaction, user, request, extra) is dropped.
 */
export function sanitizeEvent(event: SentryType.Event): SentryErrorEvent {
  return {
    type: undefined,
    event_id: event.event_id,
    timestamp: event.timestamp,
    platform: "node",
    level: event.level,
    release: event.release,
    environment: event.environment,
    message: event.message ? scrubString(event.message) : undefined,
    exception: event.exception
      ? {
          values: event.exception.values?.map((v) => ({
            type: v.type,
            value: scrubString(v.value ?? ""),
            stacktrace: v.stacktrace
              ? {
                  // NO: abs_path, context_line, pre_context, post_context, vars
                  frames: v.stacktrace.frames?.map((f) => ({
                    filename: sanitizePath(f.filename ?? ""),
                    function: f.function,
                    lineno: f.lineno,
                    colno: f.colno,
                    in_app: f.in_app,
                  })),
                }
              : undefined,
          })),
        }
      : undefined,
    tags: {
      subsystem: event.tags?.subsystem !== undefined ? scrubString(String(event.tags.subsystem)) : undefined,
      operation: event.tags?.operation !== undefined ? scrubString(String(event.tags.operation)) : undefined,
    },
  };
}

export function scrubString(input: string): string {
  return input
    .replace(/:\/\/[^\s:@/]+:[^\s@/]+@/g, "://[REDACTED]@")
    .replace(/\b(?:ghp|gho|ghs)_[A-Za-z0-9]{36}\b/g, "[REDACTED]")
    .replace(/Bearer\s+[\w.-]+/gi, "[REDACTED]")
    .replace(/\/home\/[^/\s]+/g, "$HOME")
    .replace(/\/Users\/[^/\s]+/g, "$HOME")
    .replace(/C:\\Users\\[^\\\s]+/g, "%USERPROFILE%")
    .replace(/\b[\w.+-]+@[\w-]+(?:\.[\w-]+)*\.\w{2,}\b/g, "[EMAIL]")
    .slice(0, 500);
}

/** Frames inside the tool become tool-relative; anything under node_modules keeps only its basename. */
export function sanitizePath(path: string): string {
  const marker = "commit-bump/";
  const idx = path.lastIndexOf(marker);
  if (idx >= 0 && !path.includes("node_modules", idx)) {
    return path.slice(idx);
  }
  if (path.includes("node_modules")) {
    const parts = path.split(/[\\/]/);
    return parts[parts.length - 1] || path;
  }
  return path
    .replace(/\/home\/[^/]+/g, "$HOME")
    .replace(/\/Users\/[^/]+/g, "$HOME")
    .replace(/C:\\Users\\[^\\]+/g, "%USERPROFILE%");
}

export function captureError(
  error: Error,
  context: { subsystem: string; operation: string },
  now: number = Date.now(),
): string | undefined {
  if (!initialized || !Sentry) {
    return undefined;
  }

  const fingerprint = `${error.name}:${scrubString(error.message).slice(0, 100)}`;
  const lastSeen = errorDedup.get(fingerprint);
  if (lastSeen !== undefined && now - lastSeen < DEDUP_WINDOW_MS) {
    return undefined;
  }
  errorDedup.set(fingerprint, now);

  const sentry = Sentry;
  let eventId: string | undefined;
  sentry.withScope((scope) => {
    scope.setTag("subsystem", context.subsystem);
    scope.setTag("operation", context.operation);
    eventId = sentry.captureException(error);
  });
  return eventId;
}

export function isErrorReporterActive(): boolean {
  return initialized;
}

export async function flushErrorReporter(timeoutMs = 2000): Promise<boolean> {
  if (!initialized || !Sentry) {
    return false;
  }
  try {
    return await Sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn(`error report flush failed: ${err instanceof Error ? err.message : String(err)}`);
    return false;
  }
}
