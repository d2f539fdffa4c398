/**
 * Cobbler profile names carry a single `arch:` prefix. Profiles stored as
 * `arch:distro:flavour` are rewritten to `arch:distro-flavour`; the rewrite is
 * one-way and there is no attempt to recover the original separators.
 */
export function normalizeProfileName(profile: string): string {
  const first = profile.indexOf(':');
  if (first === -1 || profile.indexOf(':', first + 1) === -1) {
    return profile;
  }
  return profile.slice(0, first + 1) + profile.slice(first + 1).replace(/:/g, '-');
}
