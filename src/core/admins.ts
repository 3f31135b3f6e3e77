export interface AdminDirectory {
  isAdmin(identifier: string): boolean;
}

/** Case-insensitive allow-list of admin email addresses and chat user ids. */
export function createAdminDirectory(identifiers: string[]): AdminDirectory {
  const known = new Set(
    identifiers.map((id) => id.trim().toLowerCase()).filter(Boolean)
  );
  return {
    isAdmin: (identifier) => known.has(identifier.trim().toLowerCase())
  };
}

export function parseIdentifierList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
