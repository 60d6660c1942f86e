import * as Sentry from '@sentry/remix';
import { scrubRecord, scrubBreadcrumbData, scrubUrl } from '@cvd-risk/core';
import { config } from './config.server';

type EventContexts = NonNullable<Sentry.ErrorEvent['contexts']>;

const NETWORK_CATEGORIES = new Set(['fetch', 'xhr', 'http']);

/**
 * Strip patient data from an error event before it leaves the server.
 */
export function scrubEvent(event: Sentry.ErrorEvent): Sentry.ErrorEvent {
  if (event.extra) {
    event.extra = scrubRecord(event.extra);
  }
  if (event.contexts) {
    const contexts: EventContexts = {};
    for (const [name, context] of Object.entries(event.contexts)) {
      if (context) contexts[name] = scrubRecord(context);
    }
    event.contexts = contexts;
  }
  if (event.request) {
    // Request bodies are patient cases; remove entirely
    delete event.request.data;
    delete event.request.cookies;
    if (event.request.url) {
      event.request.url = scrubUrl(event.request.url);
    }
    if (typeof event.request.query_string === 'string') {
      const scrubbed = scrubUrl('/?' + event.request.query_string);
      event.request.query_string = scrubbed.slice(scrubbed.indexOf('?') + 1);
    }
    if (event.request.headers) {
      delete event.request.headers.cookie;
    }
  }
  if (event.breadcrumbs) {
    event.breadcrumbs = event.breadcrumbs.map(scrubBreadcrumb);
  }
  return event;
}

export function scrubBreadcrumb(breadcrumb: Sentry.Breadcrumb): Sentry.Breadcrumb {
  if (breadcrumb.category && NETWORK_CATEGORIES.has(breadcrumb.category) && breadcrumb.data) {
    return { ...breadcrumb, data: scrubBreadcrumbData(breadcrumb.data) };
  }
  if (breadcrumb.category === 'console') {
    return {
      ...breadcrumb,
      message: breadcrumb.message ? '[Filtered]' : breadcrumb.message,
      data: breadcrumb.data ? scrubRecord(breadcrumb.data) : breadcrumb.data,
    };
  }
  return breadcrumb;
}

let initialized = false;

/**
 * Initialise Sentry once. No-op without SENTRY_DSN.
 */
export function initSentry(): void {
  if (initialized) return;
  initialized = true;

  if (!config.sentryDsn) {
    console.log('SENTRY_DSN not set, error reporting disabled');
    return;
  }

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.environment,
    tracesSampleRate: config.sentryTracesSampleRate,
    beforeSend: scrubEvent,
    beforeBreadcrumb: scrubBreadcrumb,
  });
}
