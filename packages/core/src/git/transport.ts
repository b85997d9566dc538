import type { RepositoryLocation, TransportScheme } from './types';
import { InvalidIdentifierError } from './errors';

/** Order in which transports are tried when nothing else is configured */
export const DEFAULT_TRANSPORTS: readonly TransportScheme[] = ['ssh', 'https'];

export const TRANSPORT_SCHEMES: readonly TransportScheme[] = ['ssh', 'https'];

export function isTransportScheme(value: string): value is TransportScheme {
  return (TRANSPORT_SCHEMES as readonly string[]).includes(value);
}

/**
 * Splits `host/owner/name[/...]` at the first slash and keeps only the
 * first two path segments.
 *
 * @throws InvalidIdentifierError when host or path is missing
 *
 * @example
 * parseIdentifier('github.com/acme/widget/v2/sub');
 * // => { host: 'github.com', path: 'acme/widget' }
 */
export function parseIdentifier(identifier: string): RepositoryLocation {
  const slash = identifier.indexOf('/');
  if (slash <= 0 || slash === identifier.length - 1) {
    throw new InvalidIdentifierError(identifier);
  }

  const host = identifier.slice(0, slash);
  const segments = identifier.slice(slash + 1).split('/');

  return { host, path: segments.slice(0, 2).join('/') };
}

/**
 * Clone address for `identifier` over `scheme`:
 * `git@<host>:<path>` for ssh, `https://<host>/<path>` for https.
 */
export function buildCloneTarget(identifier: string, scheme: TransportScheme): string {
  const { host, path } = parseIdentifier(identifier);

  switch (scheme) {
    case 'ssh':
      return `git@${host}:${path}`;
    case 'https':
      return `https://${host}/${path}`;
  }
}
