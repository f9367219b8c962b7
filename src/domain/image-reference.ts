/**
 * Docker image reference parsing.
 *
 * Accepts the reference grammar used by `docker pull`:
 *
 *   [registry[:port]/]path[/path...][:tag][@digest]
 *
 * Path components are lowercase alphanumerics joined by `.`, `_`, `__` or
 * runs of `-`. Tags are up to 128 word characters, dots and dashes. Digests
 * are `algorithm:hex` with at least 32 hex digits.
 */

export const DEFAULT_REGISTRY = 'docker.io';

const MAX_NAME_LENGTH = 255;

const DOMAIN_COMPONENT = '(?:[a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])';
const DOMAIN = `${DOMAIN_COMPONENT}(?:\\.${DOMAIN_COMPONENT})*(?::[0-9]+)?`;
const PATH_COMPONENT = '[a-z0-9]+(?:(?:[._]|__|-+)[a-z0-9]+)*';
const NAME = `(?:${DOMAIN}/)?${PATH_COMPONENT}(?:/${PATH_COMPONENT})*`;
const TAG = '[\\w][\\w.-]{0,127}';
const DIGEST = '[A-Za-z][A-Za-z0-9]*(?:[-_+.][A-Za-z][A-Za-z0-9]*)*:[0-9A-Fa-f]{32,}';

const REFERENCE_RE = new RegExp(`^(${NAME})(?::(${TAG}))?(?:@(${DIGEST}))?$`);

export interface ImageReference {
  /** Registry host, `docker.io` when the reference names none. */
  registry: string;
  /** Repository path without the registry, e.g. `library/nginx` stays `nginx`. */
  repository: string;
  tag: string | null;
  digest: string | null;
}

/**
 * Decides whether the first path component names a registry.
 *
 * Mirrors the docker client: a component is a registry host when it
 * contains a dot or a port, is `localhost`, or has uppercase letters
 * (repository paths are lowercase only).
 */
function isRegistryHost(component: string): boolean {
  return component.includes('.')
    || component.includes(':')
    || component === 'localhost'
    || component !== component.toLowerCase();
}

/**
 * Parses an image reference. Returns `null` when the string is not a
 * valid reference.
 */
export function parseImageReference(raw: string): ImageReference | null {
  const match = REFERENCE_RE.exec(raw);
  if (match === null) return null;

  const name = match[1] ?? '';
  if (name.length > MAX_NAME_LENGTH) return null;

  let registry = DEFAULT_REGISTRY;
  let repository = name;

  const slash = name.indexOf('/');
  if (slash !== -1) {
    const first = name.slice(0, slash);
    if (isRegistryHost(first)) {
      registry = first;
      repository = name.slice(slash + 1);
    }
  }

  return {
    registry,
    repository,
    tag: match[2] ?? null,
    digest: match[3] ?? null,
  };
}

export function isValidImageReference(raw: string): boolean {
  return parseImageReference(raw) !== null;
}

/** Registry host of a reference, `docker.io` for anything unparseable. */
export function registryOf(raw: string): string {
  return parseImageReference(raw)?.registry ?? DEFAULT_REGISTRY;
}
