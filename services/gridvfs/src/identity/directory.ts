/**
 * Maps a backend owner (`name#zone`) to the identity string the grid keeps
 * for it. Ids are decimal strings on the grid side; turning them into
 * numbers is the translator's job.
 */
export interface IdentityDirectory {
  kind: string;
  resolve(owner: string): Promise<string | null>;
}

export function formatOwner(name: string, zone: string): string {
  return `${name}#${zone}`;
}

export function createStaticIdentityDirectory(entries: Record<string, string>): IdentityDirectory {
  const identities = new Map(Object.entries(entries));
  return {
    kind: 'static',
    async resolve(owner) {
      return identities.get(owner) ?? null;
    }
  };
}

/** The owner name already is the id (local uids). */
export function createPassthroughIdentityDirectory(): IdentityDirectory {
  return {
    kind: 'passthrough',
    async resolve(owner) {
      const separator = owner.lastIndexOf('#');
      const name = separator >= 0 ? owner.slice(0, separator) : owner;
      return name.length > 0 ? name : null;
    }
  };
}

export function parseIdentityMap(raw: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const pair of raw.split(',')) {
    const trimmed = pair.trim();
    if (!trimmed) {
      continue;
    }
    const separator = trimmed.lastIndexOf('=');
    if (separator <= 0 || separator === trimmed.length - 1) {
      throw new Error(`Invalid identity map entry: ${trimmed}`);
    }
    entries[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
  }
  return entries;
}
