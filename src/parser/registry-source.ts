import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { RegistrySourceError } from '../core/errors.js';

/** Where the registry document comes from, decided once from the user's location string. */
export type RegistrySource = { kind: 'file'; path: string } | { kind: 'url'; url: string };

/** Subset of the global `fetch` the loader depends on. */
export type RegistryFetch = (url: string) => Promise<Response>;

/** Loader options; `fetch` defaults to the global implementation. */
export interface ReadRegistryOptions {
  fetch?: RegistryFetch;
}

/** Schemes that route a location to a network fetch. */
const REMOTE_SCHEMES = ['http://', 'https://'];

/** Classify a location string as a remote URL or a local path. */
export function resolveRegistrySource(location: string): RegistrySource {
  if (REMOTE_SCHEMES.some((scheme) => location.startsWith(scheme))) {
    return { kind: 'url', url: location };
  }

  return { kind: 'file', path: location };
}

/** Human-readable name used for diagnostics and parser error messages. */
export function describeRegistrySource(source: RegistrySource): string {
  return source.kind === 'url' ? source.url : path.basename(source.path);
}

/** Read the full registry text. Any failure is fatal and surfaces as `RegistrySourceError`. */
export async function readRegistrySource(
  source: RegistrySource,
  options: ReadRegistryOptions = {}
): Promise<string> {
  if (source.kind === 'file') {
    try {
      return await readFile(source.path, 'utf8');
    } catch (error) {
      throw new RegistrySourceError(source, `Unable to read registry file '${source.path}'.`, {
        cause: error
      });
    }
  }

  const fetchImpl = options.fetch ?? fetch;
  let response: Response;
  try {
    response = await fetchImpl(source.url);
  } catch (error) {
    throw new RegistrySourceError(source, `Unable to fetch registry '${source.url}'.`, { cause: error });
  }

  if (!response.ok) {
    throw new RegistrySourceError(
      source,
      `Fetching registry '${source.url}' failed with HTTP ${response.status}.`
    );
  }

  try {
    return await response.text();
  } catch (error) {
    throw new RegistrySourceError(source, `Unable to read the body of registry '${source.url}'.`, {
      cause: error
    });
  }
}
