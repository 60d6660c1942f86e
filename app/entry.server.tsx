import { PassThrough } from "stream";
import { renderToPipeableStream } from "react-dom/server";
import { RemixServer } from "@remix-run/react";
import {
  createReadableStreamFromReadable,
  type EntryContext,
} from "@remix-run/node";
import { isbot } from "isbot";
import * as Sentry from "@sentry/remix";
import { initSentry } from "./lib/sentry.server";

initSentry();

// Graceful shutdown: allow in-flight requests to drain
process.on('SIGTERM', () => {
  console.log('SIGTERM received, shutting down gracefully...');
  setTimeout(() => {
    console.log('Graceful shutdown complete');
    process.exit(0);
  }, 5_000);
});

export const streamTimeout = 5000;

export default async function handleRequest(
  request: Request,
  responseStatusCode: number,
  responseHeaders: Headers,
  remixContext: EntryContext
) {
  const userAgent = request.headers.get("user-agent");
  const callbackName = isbot(userAgent ?? '')
    ? "onAllReady"
    : "onShellReady";

  return new Promise<Response>((resolve, reject) => {
    const { pipe, abort } = renderToPipeableStream(
      <RemixServer
        context={remixContext}
        url={request.url}
      />,
      {
        [callbackName]: () => {
          const body = new PassThrough();
          const stream = createReadableStreamFromReadable(body);

          responseHeaders.set("Content-Type", "text/html");
          resolve(
            new Response(stream, {
              headers: responseHeaders,
              status: responseStatusCode,
            })
          );
          pipe(body);
        },
        onShellError(error) {
          Sentry.captureException(error);
          reject(error);
        },
        onError(error) {
          responseStatusCode = 500;
          console.error(error);
          Sentry.captureException(error);
        },
      }
    );

    // Abort the renderer after the stream timeout plus a second to flush rejected boundaries
    setTimeout(abort, streamTimeout + 1000);
  });
}
