import { EnvHttpProxyAgent, fetch } from 'undici'

import type { Transport } from '../../types/transport'

/**
 * Create the default transport: undici fetch through a dispatcher that
 * honours `HTTP_PROXY`, `HTTPS_PROXY` and `NO_PROXY`.
 *
 * @param options - Transport options.
 * @param options.skipTlsVerify - Accept invalid server certificates.
 * @returns Transport bound to its own dispatcher.
 */
export function createTransport(
  options: { skipTlsVerify?: boolean } = {},
): Transport {
  let tls = { rejectUnauthorized: !options.skipTlsVerify }
  /* `connect` covers direct connections, `requestTls` proxied ones. */
  let agentOptions = { requestTls: tls, connect: tls }
  let dispatcher = new EnvHttpProxyAgent(agentOptions)

  return (url, request) =>
    fetch(url, {
      signal: request.signal ?? null,
      headers: request.headers,
      method: request.method,
      body: request.body,
      dispatcher,
    })
}
