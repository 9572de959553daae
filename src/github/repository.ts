import { HostingApiError } from "../errors.js";

export type RepositorySlug = {
  owner: string;
  name: string;
};

const SEGMENT = /^[A-Za-z0-9_.-]+$/;
const URL_WITH_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const SCP_LIKE = /^[^@\s/]+@[^:\s]+:/;

/** Parse an `owner/name` slug. */
export function parseSlug(slug: string): RepositorySlug {
  const parts = slug.split("/");
  const [owner, name] = parts;
  if (parts.length !== 2 || !owner || !name || !SEGMENT.test(owner) || !SEGMENT.test(name)) {
    throw new HostingApiError(`Invalid repository '${slug}', expected owner/name`);
  }
  return { owner, name };
}

/**
 * Derive the repository from a remote URL:
 * `https://github.com/o/n.git`, `ssh://git@github.com/o/n`, `git@github.com:o/n.git`.
 */
export function parseRepositorySlug(remoteUrl: string): RepositorySlug {
  const url = remoteUrl.trim();
  if (!URL_WITH_SCHEME.test(url) && !SCP_LIKE.test(url)) {
    throw new HostingApiError(`Cannot infer GitHub repository from remote '${remoteUrl}'`);
  }

  const segments = url
    .replace(/\/+$/, "")
    .replace(/\.git$/, "")
    .split(/[/:]/);
  const name = segments.pop();
  const owner = segments.pop();
  if (!owner || !name || !SEGMENT.test(owner) || !SEGMENT.test(name)) {
    throw new HostingApiError(`Cannot infer GitHub repository from remote '${remoteUrl}'`);
  }
  return { owner, name };
}

export function formatSlug(slug: RepositorySlug): string {
  return `${slug.owner}/${slug.name}`;
}
