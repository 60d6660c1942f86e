import { json } from '@remix-run/node';

// Liveness check. Verifies the server can respond to HTTP; nothing downstream.
export async function loader() {
  return json({ status: 'ok' }, { status: 200 });
}
